import { z } from 'zod';
import { SensorCommandResult } from '@/types/sensor.types';
import { SensorRegistry } from './sensor-registry.service';
import { getErrorMessage } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

export const SUPPORTED_ACTIONS = ['read', 'execute', 'status', 'configure'] as const;

const nowSeconds = (): number => Date.now() / 1000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const sensorCommandSchema = z
  .object({
    action: z.string().optional(),
    sensor_id: z.string().optional(),
    params: z.record(z.unknown()).nullish(),
    config: z.record(z.unknown()).nullish(),
  })
  .passthrough();

const errorResult = (command: string, error: string): SensorCommandResult => ({
  command,
  status: 'error',
  error,
  timestamp: nowSeconds(),
});

/**
 * Map a platform sensor command onto the registry.
 * Always resolves with a structured result, never rejects.
 */
export async function processCommand(
  registry: SensorRegistry,
  input: unknown
): Promise<SensorCommandResult> {
  const parsed = sensorCommandSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    const label = isRecord(input) && typeof input.action === 'string' ? input.action : 'unknown';
    logger.warn(`Rejected sensor command: ${where}${issue?.message}`);
    return errorResult(label, `Invalid sensor command: ${where}${issue?.message ?? 'invalid'}`);
  }

  const command = parsed.data;
  const action = command.action;
  const sensorId = command.sensor_id || undefined;
  const params = command.params ?? {};

  try {
    switch (action) {
      case 'read': {
        if (sensorId) {
          return {
            command: 'read',
            sensor_id: sensorId,
            result: await registry.readSensor(sensorId),
            timestamp: nowSeconds(),
          };
        }
        const readings = await registry.readAllSensors();
        return { command: 'read_all', result: readings, count: readings.length, timestamp: nowSeconds() };
      }

      case 'execute': {
        if (!sensorId) {
          return errorResult('execute', 'sensor_id required for execute command');
        }
        const executeAction = typeof params.execute_action === 'string' ? params.execute_action : 'read';
        const executeParams = isRecord(params.execute_params) ? params.execute_params : {};
        return {
          command: 'execute',
          sensor_id: sensorId,
          execute_action: executeAction,
          result: await registry.executeSensorAction(sensorId, executeAction, executeParams),
          timestamp: nowSeconds(),
        };
      }

      case 'status':
        return {
          command: 'status',
          sensor_id: sensorId ?? null,
          result: await registry.getSensorStatus(sensorId),
          timestamp: nowSeconds(),
        };

      case 'configure': {
        if (!sensorId) {
          return errorResult('configure', 'sensor_id is required for configure command');
        }
        return {
          command: 'configure',
          sensor_id: sensorId,
          result: await registry.configureSensor(sensorId, command.config ?? params),
          timestamp: nowSeconds(),
        };
      }

      default:
        return errorResult(
          action ?? 'unknown',
          `Unknown action: ${action}. Supported actions: ${SUPPORTED_ACTIONS.join(', ')}`
        );
    }
  } catch (error) {
    logger.error(`Sensor command ${action} failed: ${getErrorMessage(error)}`);
    return errorResult(action ?? 'unknown', getErrorMessage(error));
  }
}
