import cron, { ScheduledTask } from 'node-cron';
import { publishTelemetry, TelemetryDeps } from '@/services/telemetry.service';
import { CRON_CONFIG } from '@/config/constants';
import { ConfigError, getErrorMessage } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

/**
 * Convert a whole-second interval into a six-field cron expression.
 * Intervals that do not divide a minute or an hour evenly are rejected.
 */
export function intervalToCron(seconds: number): string {
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new ConfigError(`Telemetry interval must be a positive whole number of seconds, got ${seconds}`);
  }
  if (seconds < 60 && 60 % seconds === 0) {
    return `*/${seconds} * * * * *`;
  }
  if (seconds % 60 === 0 && seconds < 3600 && 60 % (seconds / 60) === 0) {
    return `0 */${seconds / 60} * * * *`;
  }
  if (seconds === 3600) {
    return '0 0 * * * *';
  }
  throw new ConfigError(`Telemetry interval ${seconds}s cannot be expressed as a cron schedule`);
}

export function assertTelemetrySchedule(schedule: string): void {
  if (!cron.validate(schedule)) {
    throw new ConfigError(`Invalid telemetry schedule: ${schedule}`);
  }
}

/**
 * Start the telemetry job. A tick that is still running when the next one
 * fires causes that next tick to be skipped.
 */
export function startTelemetryJob(
  deps: TelemetryDeps,
  schedule: string = CRON_CONFIG.TELEMETRY
): ScheduledTask {
  assertTelemetrySchedule(schedule);

  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      logger.warn('Previous telemetry cycle still running, skipping tick');
      return;
    }
    running = true;
    try {
      await publishTelemetry(deps);
    } catch (error) {
      logger.error(`Telemetry job error: ${getErrorMessage(error)}`);
    } finally {
      running = false;
    }
  };

  logger.info(`Telemetry job scheduled: ${schedule}`);
  return cron.schedule(schedule, tick);
}
