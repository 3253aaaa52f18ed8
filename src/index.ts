export { DeviceAgent, DeviceAgentOptions } from './agent';
export { hostDriverFactory, HOST_SENSOR_TYPES } from './drivers/host-driver.factory';
export { validateCommand, validateExpiry, checkAuth } from './services/auth.service';
export { SensorRegistry, parseSensorAction } from './services/sensor-registry.service';
export { processCommand } from './services/sensor-command.service';
export { RuleCache } from './services/rule-cache.service';
export { HttpPlatformApi, PlatformApi } from './services/platform-api.service';
export {
  validateSensorConfig,
  loadSensorConfigFile,
  saveSensorConfigFile,
  loadEnvSensorConfig,
  createSampleConfig,
} from './services/sensor-config.service';
export { loadDeviceConfig, saveDeviceConfig, toIdentity } from './services/device-config.service';
export { MessageTransport, SocketTransport } from './transport/socket.connection';
export { intervalToCron } from './jobs/telemetry.job';
export { generateKeyPair, signMessage, verifySignature } from './utils/crypto.utils';
export { makeCommand, makeExecCommand, decodeInbound } from './utils/codec.utils';
export * from './utils/errors.utils';
export * from './types/device.types';
export * from './types/envelope.types';
export * from './types/rule.types';
export * from './types/sensor.types';
