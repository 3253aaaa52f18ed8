import { z } from 'zod';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DeviceConfigFile, DeviceIdentity } from '@/types/device.types';
import { AGENT_CONFIG, NETWORKS, isNetworkId } from '@/config/constants';
import { accountFromPublicKey, isHexKey, isMatchingKeyPair } from '@/utils/crypto.utils';
import { ConfigError, getErrorMessage, isMissingFileError } from '@/utils/errors.utils';

const hexKey = (field: string) =>
  z.string({ required_error: `Missing required field: ${field}` }).refine(isHexKey, `${field} must be 64 hex characters`);

export const deviceConfigSchema = z
  .object({
    device_id: z.string({ required_error: 'Missing required field: device_id' }).min(1, 'device_id must be a non-empty string'),
    device_name: z.string().optional(),
    description: z.string().optional(),
    network_id: z.string().refine(isNetworkId, 'network_id must be one of mainnet01, testnet04'),
    node_url: z.string().url('node_url must be a URL'),
    public_key: hexKey('public_key'),
    secret_key: hexKey('secret_key'),
  })
  .refine(
    (config) => isMatchingKeyPair({ publicKey: config.public_key, secretKey: config.secret_key }),
    'public_key does not match secret_key'
  );

export const validateDeviceConfig = (candidate: unknown): DeviceConfigFile => {
  const parsed = deviceConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(`Invalid device configuration: ${parsed.error.issues[0]?.message}`);
  }
  const { network_id: networkId, ...rest } = parsed.data;
  if (!isNetworkId(networkId)) {
    throw new ConfigError(`Invalid device configuration: unknown network ${networkId}`);
  }
  return { ...rest, network_id: networkId };
};

/**
 * @returns null when the device has not been set up yet
 */
export async function loadDeviceConfig(
  filePath: string = AGENT_CONFIG.DEVICE_CONFIG_FILE
): Promise<DeviceConfigFile | null> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw new ConfigError(`Failed to read ${filePath}: ${getErrorMessage(error)}`);
  }

  try {
    return validateDeviceConfig(JSON.parse(text));
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`);
  }
}

export async function saveDeviceConfig(
  config: DeviceConfigFile,
  filePath: string = AGENT_CONFIG.DEVICE_CONFIG_FILE
): Promise<void> {
  const validated = validateDeviceConfig(config);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  // Holds the secret key
  await fs.writeFile(filePath, JSON.stringify(validated, null, 2), { mode: 0o600 });
}

export const toIdentity = (config: DeviceConfigFile): DeviceIdentity => ({
  device_id: config.device_id,
  key_pair: { publicKey: config.public_key, secretKey: config.secret_key },
  account: accountFromPublicKey(config.public_key),
  network_id: config.network_id,
  node_url: config.node_url || NETWORKS[config.network_id].NODE_URL,
});
