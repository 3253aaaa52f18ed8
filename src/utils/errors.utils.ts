export type AgentErrorCode =
  | 'CONFIG_INVALID'
  | 'PLATFORM_REQUEST_FAILED'
  | 'HARDWARE_TIMEOUT'
  | 'DRIVER_UNAVAILABLE'
  | 'NOT_CONNECTED'
  | 'DECODE_FAILED';

export class AgentError extends Error {
  constructor(public readonly code: AgentErrorCode, message: string) {
    super(message);
    this.name = 'AgentError';
  }
}

export class ConfigError extends AgentError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

export class PlatformRequestError extends AgentError {
  constructor(message: string, public readonly statusCode?: number) {
    super('PLATFORM_REQUEST_FAILED', message);
    this.name = 'PlatformRequestError';
  }
}

export class HardwareTimeoutError extends AgentError {
  constructor(operation: string, timeoutMs: number) {
    super('HARDWARE_TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
    this.name = 'HardwareTimeoutError';
  }
}

export class DecodeError extends AgentError {
  constructor(message: string) {
    super('DECODE_FAILED', message);
    this.name = 'DecodeError';
  }
}

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// fs errors may come from another realm, so match on the code rather than the class
export const isMissingFileError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
