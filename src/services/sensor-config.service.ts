import { z } from 'zod';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SensorConfig, SensorConfigFile } from '@/types/sensor.types';
import { AGENT_CONFIG } from '@/config/constants';
import { ConfigError, getErrorMessage, isMissingFileError } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

const nonEmpty = (field: string) =>
  z
    .string({
      required_error: `Missing required field: ${field}`,
      invalid_type_error: `${field} must be a non-empty string`,
    })
    .refine((value) => value.trim().length > 0, `${field} must be a non-empty string`);

export const sensorConfigSchema = z.object({
  sensor_id: nonEmpty('sensor_id'),
  sensor_type: nonEmpty('sensor_type'),
  inputs: z.record(z.unknown(), { invalid_type_error: 'inputs must be a dictionary' }).default({}),
  enabled: z.boolean({ invalid_type_error: 'enabled must be a boolean' }).default(true),
  alias: z.string().nullish().transform((alias) => alias ?? undefined),
});

// Fields accepted by a runtime `configure`; everything optional, merged over the existing config
export const sensorConfigUpdateSchema = z.object({
  sensor_type: nonEmpty('sensor_type').optional(),
  inputs: z.record(z.unknown(), { invalid_type_error: 'inputs must be a dictionary' }).optional(),
  enabled: z.boolean({ invalid_type_error: 'enabled must be a boolean' }).optional(),
  alias: z.string().nullable().optional(),
});

const sensorConfigFileSchema = z.object({
  sensors: z.array(z.unknown()).default([]),
  device: z.record(z.unknown()).optional(),
});

export type RawSensorConfigFile = z.infer<typeof sensorConfigFileSchema>;

export interface SensorConfigValidation {
  valid: boolean;
  error?: string;
  config?: SensorConfig;
}

export const validateSensorConfig = (candidate: unknown): SensorConfigValidation => {
  const parsed = sensorConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    return { valid: false, error: parsed.error.issues[0]?.message ?? 'Invalid sensor configuration' };
  }
  return { valid: true, config: parsed.data };
};

/**
 * Read a sensor configuration file. Entries are returned unvalidated so the
 * registry can load the good ones and report the bad ones individually.
 * @returns null when the file does not exist
 */
export async function loadSensorConfigFile(
  filePath: string = AGENT_CONFIG.SENSOR_CONFIG_FILE
): Promise<RawSensorConfigFile | null> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw new ConfigError(`Failed to read ${filePath}: ${getErrorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`);
  }

  const parsed = sensorConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid sensor configuration file ${filePath}: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

export async function saveSensorConfigFile(
  configs: SensorConfig[],
  filePath: string = AGENT_CONFIG.SENSOR_CONFIG_FILE
): Promise<void> {
  const payload: SensorConfigFile = { sensors: configs };
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(payload, null, 2));
}

/**
 * Sensor list from the AGENT_SENSORS environment variable (a JSON array)
 */
export const loadEnvSensorConfig = (env: NodeJS.ProcessEnv = process.env): unknown[] | null => {
  const raw = env[AGENT_CONFIG.SENSORS_ENV_VAR];
  if (!raw) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      logger.error(`${AGENT_CONFIG.SENSORS_ENV_VAR} must be a JSON array`);
      return null;
    }
    return parsed;
  } catch (error) {
    logger.error(`Failed to parse ${AGENT_CONFIG.SENSORS_ENV_VAR}: ${getErrorMessage(error)}`);
    return null;
  }
};

export const createSampleConfig = (): SensorConfigFile => ({
  sensors: [
    {
      sensor_id: 'cpu_temp',
      sensor_type: 'vcgen',
      inputs: {},
      enabled: true,
      alias: 'CPU Temperature Monitor',
    },
    {
      sensor_id: 'system_1',
      sensor_type: 'system',
      inputs: {},
      enabled: true,
      alias: 'Host Load and Memory',
    },
    {
      sensor_id: 'display_1',
      sensor_type: 'virtual_display',
      inputs: { columns: 16, rows: 2 },
      enabled: false,
      alias: 'Status Display',
    },
    {
      sensor_id: 'relay_1',
      sensor_type: 'virtual_relay',
      inputs: { initial_value: false },
      enabled: false,
      alias: 'Output Relay',
    },
  ],
});
