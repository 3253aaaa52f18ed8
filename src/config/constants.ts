import dotenv from 'dotenv';
import * as path from 'node:path';
import Config from '@/core/config';

dotenv.config();

// Agent file layout
export const AGENT_CONFIG = {
  CONFIG_DIR: Config.AGENT_HOME,
  DEVICE_CONFIG_FILE: path.join(Config.AGENT_HOME, 'device_config.json'),
  SENSOR_CONFIG_FILE: path.join(Config.AGENT_HOME, 'sensor_config.json'),
  SENSORS_ENV_VAR: 'AGENT_SENSORS',
} as const;

// Platform network environments
export const NETWORKS = {
  mainnet01: {
    label: 'Mainnet',
    NODE_URL: process.env.MAINNET_NODE_URL || 'https://node.iot-platform.example',
  },
  testnet04: {
    label: 'Testnet',
    NODE_URL: process.env.TESTNET_NODE_URL || 'https://testnet.iot-platform.example',
  },
} as const;

export type NetworkId = keyof typeof NETWORKS;

export const NETWORK_IDS: NetworkId[] = ['mainnet01', 'testnet04'];

export const DEFAULT_NETWORK: NetworkId = 'mainnet01';

// Cron Job Configuration (node-cron, six fields = with seconds)
export const CRON_CONFIG = {
  TELEMETRY: process.env.CRON_TELEMETRY || '0 * * * * *',
} as const;

// socket.io-client reconnection: exponential backoff, capped, with jitter
export const RECONNECT_CONFIG = {
  DELAY_MS: parseInt(process.env.RECONNECT_DELAY_MS || '1000', 10),
  DELAY_MAX_MS: parseInt(process.env.RECONNECT_DELAY_MAX_MS || '30000', 10),
  JITTER: parseFloat(process.env.RECONNECT_JITTER || '0.5'),
} as const;

export const HARDWARE_CONFIG = {
  CALL_TIMEOUT_MS: parseInt(process.env.HARDWARE_CALL_TIMEOUT_MS || '5000', 10),
} as const;

export const PLATFORM_API_CONFIG = {
  BASE_URL: process.env.PLATFORM_API_URL || '',
  TIMEOUT_MS: parseInt(process.env.PLATFORM_API_TIMEOUT_MS || '10000', 10),
} as const;

// Socket event names spoken by the platform node
export const SOCKET_EVENTS = {
  MESSAGE: 'onmessage',
  SUBSCRIBE: 'subscribe',
  PUBLISH: 'publish',
} as const;

export const isNetworkId = (value: string): value is NetworkId =>
  Object.prototype.hasOwnProperty.call(NETWORKS, value);
