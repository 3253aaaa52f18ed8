import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { KeyPair } from '@/types/device.types';
import {
  CommandEnvelope,
  CommandPayload,
  SignedCommand,
  SignedExecCommand,
} from '@/types/envelope.types';
import { DecodeError, getErrorMessage } from './errors.utils';
import { hashMessage, signMessage } from './crypto.utils';

const signatureSchema = z.object({
  pubKey: z.string(),
  sig: z.string(),
});

const signedExecSchema = z.object({
  device_exec: z.string(),
  sigs: z.array(signatureSchema).default([]),
});

// Flags and the sensor command are read for presence by the router; the
// sensor command's shape is checked by the command processor.
export const commandEnvelopeSchema = z
  .object({
    expiry_time: z.number().optional(),
    response_topic: z.string().nullish().transform((topic) => topic || undefined),
    update_rules: z.unknown(),
    update_device: z.unknown(),
    sensor_command: z.unknown(),
  })
  .passthrough();

export interface DecodedCommand {
  signed: SignedExecCommand;
  envelope: CommandEnvelope;
}

function parseJson(text: string, layer: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`Invalid JSON in ${layer}: ${getErrorMessage(error)}`);
  }
}

/**
 * Unwrap an inbound transport message:
 * `{ message }` -> JSON string -> signed exec command -> `device_exec` envelope.
 * Throws DecodeError on any malformed layer.
 */
export function decodeInbound(raw: unknown): DecodedCommand {
  let outer: unknown = raw;
  if (typeof raw === 'object' && raw !== null && 'message' in raw) {
    outer = raw.message;
  }
  if (typeof outer !== 'string') {
    throw new DecodeError('Transport message is not a string');
  }

  let inner = parseJson(outer, 'transport message');
  if (typeof inner === 'string') {
    inner = parseJson(inner, 'signed command');
  }

  const signed = signedExecSchema.safeParse(inner);
  if (!signed.success) {
    throw new DecodeError(`Malformed signed command: ${signed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const envelope = commandEnvelopeSchema.safeParse(parseJson(signed.data.device_exec, 'device_exec'));
  if (!envelope.success) {
    throw new DecodeError(`Malformed command envelope: ${envelope.error.issues[0]?.message ?? 'invalid'}`);
  }

  return { signed: signed.data, envelope: envelope.data };
}

/**
 * Wrap and sign an outbound payload
 */
export function makeCommand<T>(payload: T, keyPair: KeyPair): SignedCommand {
  const body: CommandPayload<T> = {
    payload,
    pubKey: keyPair.publicKey,
    nonce: uuidv4(),
    creation_time: Math.floor(Date.now() / 1000),
  };
  const cmd = JSON.stringify(body);

  return {
    cmd,
    hash: hashMessage(cmd),
    sigs: [{ pubKey: keyPair.publicKey, sig: signMessage(cmd, keyPair) }],
  };
}

/**
 * Platform-side counterpart of decodeInbound: sign an envelope with one or more keys.
 * Used by local tooling and tests to produce commands the agent accepts.
 */
export function makeExecCommand(envelope: CommandEnvelope, signers: KeyPair[]): SignedExecCommand {
  const device_exec = JSON.stringify(envelope);
  return {
    device_exec,
    sigs: signers.map((keyPair) => ({ pubKey: keyPair.publicKey, sig: signMessage(device_exec, keyPair) })),
  };
}

// The node's wire format carries a JSON string inside the JSON message
export const encodeForTransport = (value: SignedCommand | SignedExecCommand): string =>
  JSON.stringify(JSON.stringify(value));
