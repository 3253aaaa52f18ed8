import { SensorCommandResult, SensorReading } from './sensor.types';

export interface Signature {
  pubKey: string;             // hex Ed25519 public key of the signer
  sig: string;                // hex Ed25519 signature
}

// Inbound: the platform signs the exact `device_exec` string
export interface SignedExecCommand {
  device_exec: string;
  sigs: Signature[];
}

// Decoded `device_exec`
export interface CommandEnvelope {
  expiry_time?: number;       // Unix seconds
  response_topic?: string;
  update_rules?: unknown;     // Any non-empty value requests a refresh
  update_device?: unknown;
  sensor_command?: unknown;   // SensorCommand, validated when processed
  [key: string]: unknown;
}

// Outbound: every reply and telemetry message
export interface SignedCommand {
  cmd: string;                // JSON of CommandPayload
  hash: string;               // base64url SHA-256 of cmd
  sigs: Signature[];
}

export interface CommandPayload<T = unknown> {
  payload: T;
  pubKey: string;
  nonce: string;
  creation_time: number;      // Unix seconds
}

export interface SuccessReply {
  info: 'success';
}

export interface ErrorReply {
  info: 'error';
  error: string;
}

export type ReplyBody = SuccessReply | ErrorReply | SensorCommandResult;

export interface TelemetryPayload {
  device_id: string;
  sensors: SensorReading[];
  count: number;
}

export type CommandHandler = (body: CommandEnvelope) => void | Promise<void>;
