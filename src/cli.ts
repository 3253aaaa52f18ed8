#!/usr/bin/env node
import * as fs from 'node:fs/promises';
import { DeviceConfigFile } from '@/types/device.types';
import { AGENT_CONFIG, DEFAULT_NETWORK, NETWORK_IDS, NETWORKS, isNetworkId } from '@/config/constants';
import { DeviceAgent } from '@/agent';
import { hostDriverFactory } from '@/drivers/host-driver.factory';
import { loadDeviceConfig, saveDeviceConfig, toIdentity } from '@/services/device-config.service';
import {
  createSampleConfig,
  loadEnvSensorConfig,
  loadSensorConfigFile,
  saveSensorConfigFile,
} from '@/services/sensor-config.service';
import { intervalToCron } from '@/jobs/telemetry.job';
import { generateKeyPair } from '@/utils/crypto.utils';
import { ConfigError, getErrorMessage } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

export type Flags = Record<string, string | boolean>;

export interface ParsedArgs {
  command?: string;
  flags: Flags;
}

const USAGE = `Usage: iot-device <command> [options]

Commands:
  setup    --device-id <id> [--network ${NETWORK_IDS.join('|')}] [--node-url <url>]
           [--public-key <hex> --secret-key <hex> | --generate-keys] [--sample-sensors]
  run      [--interval <seconds>]
  status
  config   [--reset]`;

/**
 * `--name value` and `--name=value` become string flags, a bare `--name` becomes true
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Flags = {};
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      command = command ?? arg;
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      flags[body] = next;
      i++;
    } else {
      flags[body] = true;
    }
  }

  return { command, flags };
}

const stringFlag = (flags: Flags, name: string): string | undefined => {
  const value = flags[name];
  return typeof value === 'string' ? value : undefined;
};

export function buildDeviceConfig(flags: Flags): DeviceConfigFile {
  const deviceId = stringFlag(flags, 'device-id');
  if (!deviceId) {
    throw new ConfigError('--device-id is required');
  }

  const network = stringFlag(flags, 'network') ?? DEFAULT_NETWORK;
  if (!isNetworkId(network)) {
    throw new ConfigError(`--network must be one of ${NETWORK_IDS.join(', ')}`);
  }

  let publicKey = stringFlag(flags, 'public-key');
  let secretKey = stringFlag(flags, 'secret-key');
  if (flags['generate-keys'] === true) {
    const keyPair = generateKeyPair();
    publicKey = keyPair.publicKey;
    secretKey = keyPair.secretKey;
  }
  if (!publicKey || !secretKey) {
    throw new ConfigError('Provide --public-key and --secret-key, or --generate-keys');
  }

  return {
    device_id: deviceId,
    device_name: stringFlag(flags, 'name'),
    description: stringFlag(flags, 'description'),
    network_id: network,
    node_url: stringFlag(flags, 'node-url') ?? NETWORKS[network].NODE_URL,
    public_key: publicKey,
    secret_key: secretKey,
  };
}

async function setup(flags: Flags): Promise<void> {
  const config = buildDeviceConfig(flags);
  await saveDeviceConfig(config);
  console.log(`✓ Device configuration written to ${AGENT_CONFIG.DEVICE_CONFIG_FILE}`);
  console.log(`  Device:  ${config.device_id}`);
  console.log(`  Network: ${config.network_id} (${config.node_url})`);
  console.log(`  Account: k:${config.public_key}`);

  if (flags['sample-sensors'] === true) {
    await saveSensorConfigFile(createSampleConfig().sensors);
    console.log(`✓ Sample sensor configuration written to ${AGENT_CONFIG.SENSOR_CONFIG_FILE}`);
  }
}

async function requireDeviceConfig(): Promise<DeviceConfigFile> {
  const config = await loadDeviceConfig();
  if (!config) {
    throw new ConfigError(`No device configuration at ${AGENT_CONFIG.DEVICE_CONFIG_FILE}. Run "iot-device setup" first`);
  }
  return config;
}

async function run(flags: Flags): Promise<void> {
  const config = await requireDeviceConfig();
  const identity = toIdentity(config);
  const interval = stringFlag(flags, 'interval');

  const agent = new DeviceAgent({
    deviceId: identity.device_id,
    keyPair: identity.key_pair,
    networkId: identity.network_id,
    nodeUrl: identity.node_url,
    driverFactory: hostDriverFactory,
    telemetrySchedule: interval ? intervalToCron(Number(interval)) : undefined,
  });

  const sensorFile = await loadSensorConfigFile();
  const entries = sensorFile?.sensors ?? loadEnvSensorConfig() ?? [];
  const loaded = await agent.loadSensorConfigs(entries);
  logger.info(`Loaded ${loaded.length} of ${entries.length} sensors`);

  agent.setConfigSaveHook((configs) => saveSensorConfigFile(configs));
  agent.onMessage((body) => {
    logger.info(`Received command: ${JSON.stringify(body)}`);
  });

  await agent.start();

  await new Promise<void>((resolve) => {
    const shutdown = (signal: string) => {
      logger.notify(`${signal} received, shutting down`);
      agent
        .close()
        .catch((error: unknown) => logger.error(`Shutdown failed: ${getErrorMessage(error)}`))
        .finally(resolve);
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });
}

async function status(): Promise<void> {
  const config = await loadDeviceConfig();
  if (!config) {
    console.log('Device is not configured. Run "iot-device setup".');
    return;
  }
  console.log('📟 Device');
  console.log(`  ID:      ${config.device_id}`);
  if (config.device_name) {
    console.log(`  Name:    ${config.device_name}`);
  }
  console.log(`  Network: ${config.network_id}`);
  console.log(`  Node:    ${config.node_url}`);

  const sensorFile = await loadSensorConfigFile();
  const sensors = sensorFile?.sensors ?? [];
  console.log(`\n🌡️  Sensors (${sensors.length})`);
  for (const entry of sensors) {
    console.log(`  ${JSON.stringify(entry)}`);
  }
}

async function showConfig(flags: Flags): Promise<void> {
  const files = [AGENT_CONFIG.DEVICE_CONFIG_FILE, AGENT_CONFIG.SENSOR_CONFIG_FILE];

  if (flags.reset === true) {
    for (const file of files) {
      await fs.rm(file, { force: true });
      console.log(`✓ Removed ${file}`);
    }
    return;
  }

  for (const file of files) {
    console.log(`# ${file}`);
    try {
      console.log(await fs.readFile(file, 'utf8'));
    } catch (error) {
      console.log(`(unreadable: ${getErrorMessage(error)})`);
    }
  }
}

export async function main(argv: string[]): Promise<number> {
  const { command, flags } = parseArgs(argv);

  try {
    switch (command) {
      case 'setup':
        await setup(flags);
        return 0;
      case 'run':
        await run(flags);
        return 0;
      case 'status':
        await status();
        return 0;
      case 'config':
        await showConfig(flags);
        return 0;
      default:
        console.log(USAGE);
        return command ? 1 : 0;
    }
  } catch (error) {
    console.error(`❌ ${getErrorMessage(error)}`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
