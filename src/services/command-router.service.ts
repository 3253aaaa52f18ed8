import { CommandEnvelope, CommandHandler, ReplyBody } from '@/types/envelope.types';
import { SensorCommandResult } from '@/types/sensor.types';
import { logger } from '@/utils/logger';

export interface CommandRouterDeps {
  refreshRules(): Promise<unknown>;
  refreshDevice(): Promise<unknown>;
  processSensorCommand(command: unknown): Promise<SensorCommandResult>;
  getHandler(): CommandHandler | null;
}

/** Null, false, 0, "" and empty arrays or objects are unset. */
function isSet(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === 'object' && value !== null) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}

/**
 * Run an authenticated envelope through its handlers and return the reply body.
 * Refresh flags apply first (rules, then device); a sensor command then
 * short-circuits, otherwise the registered handler gets the envelope.
 * Errors propagate to the caller.
 */
export async function routeCommand(envelope: CommandEnvelope, deps: CommandRouterDeps): Promise<ReplyBody> {
  if (isSet(envelope.update_rules)) {
    await deps.refreshRules();
  }
  if (isSet(envelope.update_device)) {
    await deps.refreshDevice();
  }

  if (isSet(envelope.sensor_command)) {
    return deps.processSensorCommand(envelope.sensor_command);
  }

  const handler = deps.getHandler();
  if (handler) {
    await handler(envelope);
  } else {
    logger.debug('No command handler registered');
  }
  return { info: 'success' };
}
