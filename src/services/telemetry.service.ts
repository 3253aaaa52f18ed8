import { SensorReading } from '@/types/sensor.types';
import { SignedCommand, TelemetryPayload } from '@/types/envelope.types';
import { getErrorMessage } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

export interface TelemetryDeps {
  deviceId: string;
  readAll(): Promise<SensorReading[]>;
  sign(payload: TelemetryPayload): SignedCommand;
  publish(topic: string, message: SignedCommand): void;
}

export const buildTelemetryPayload = (deviceId: string, readings: SensorReading[]): TelemetryPayload => ({
  device_id: deviceId,
  sensors: readings,
  count: readings.length,
});

/**
 * Read every enabled sensor and publish one aggregated, signed message.
 * @returns the published payload, or null when the cycle failed
 */
export async function publishTelemetry(
  deps: TelemetryDeps,
  topic: string = deps.deviceId
): Promise<TelemetryPayload | null> {
  try {
    const payload = buildTelemetryPayload(deps.deviceId, await deps.readAll());
    deps.publish(topic, deps.sign(payload));
    logger.debug(`Published telemetry for ${payload.count} sensors`);
    return payload;
  } catch (error) {
    logger.error(`Telemetry cycle failed: ${getErrorMessage(error)}`);
    return null;
  }
}
