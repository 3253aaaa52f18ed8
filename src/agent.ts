import { ScheduledTask } from 'node-cron';
import { DeviceIdentity, DeviceInfo, KeyPair } from '@/types/device.types';
import { CommandHandler, SignedCommand, TelemetryPayload } from '@/types/envelope.types';
import { Rule, RuleMatcher } from '@/types/rule.types';
import {
  ActionResult,
  AllSensorsStatus,
  ConfigSaveHook,
  ConfigureResult,
  SensorCommand,
  SensorCommandResult,
  SensorDriverFactory,
  SensorInputs,
  SensorReading,
  SensorStatus,
  SensorStatusError,
} from '@/types/sensor.types';
import { CRON_CONFIG, DEFAULT_NETWORK, NETWORKS, NetworkId } from '@/config/constants';
import { Dispatcher } from '@/services/dispatch.service';
import { HttpPlatformApi, PlatformApi, platformApiUrl } from '@/services/platform-api.service';
import { RuleCache } from '@/services/rule-cache.service';
import { SensorRegistry } from '@/services/sensor-registry.service';
import { processCommand } from '@/services/sensor-command.service';
import { buildTelemetryPayload, TelemetryDeps } from '@/services/telemetry.service';
import { assertTelemetrySchedule, startTelemetryJob } from '@/jobs/telemetry.job';
import { MessageTransport, SocketTransport } from '@/transport/socket.connection';
import { accountFromPublicKey } from '@/utils/crypto.utils';
import { makeCommand } from '@/utils/codec.utils';
import { getErrorMessage } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

export interface DeviceAgentOptions {
  deviceId: string;
  keyPair: KeyPair;
  networkId?: NetworkId;
  nodeUrl?: string;
  driverFactory: SensorDriverFactory;
  transport?: MessageTransport;
  platformApi?: PlatformApi;
  ruleMatcher?: RuleMatcher;
  telemetrySchedule?: string | false;   // false disables the job
  hardwareTimeoutMs?: number;
}

/**
 * Device-side client: connects to the platform node, answers authenticated
 * commands, manages local sensors and publishes their readings.
 */
export class DeviceAgent {
  readonly identity: DeviceIdentity;
  readonly topic: string;

  private readonly transport: MessageTransport;
  private readonly platformApi: PlatformApi;
  private readonly registry: SensorRegistry;
  private readonly rules: RuleCache;
  private readonly dispatcher: Dispatcher;
  private readonly ruleMatcher: RuleMatcher | null;
  private readonly telemetrySchedule: string | false;

  private deviceInfo: DeviceInfo | null = null;
  private handler: CommandHandler | null = null;
  private deviceData: Record<string, unknown> = {};
  private telemetryTask: ScheduledTask | null = null;
  private started = false;

  constructor(options: DeviceAgentOptions) {
    const networkId = options.networkId ?? DEFAULT_NETWORK;
    const nodeUrl = options.nodeUrl || NETWORKS[networkId].NODE_URL;

    this.identity = {
      device_id: options.deviceId,
      key_pair: { ...options.keyPair },
      account: accountFromPublicKey(options.keyPair.publicKey),
      network_id: networkId,
      node_url: nodeUrl,
    };
    this.topic = options.deviceId;

    this.transport = options.transport ?? new SocketTransport(nodeUrl);
    this.platformApi = options.platformApi ?? new HttpPlatformApi(platformApiUrl(nodeUrl));
    this.ruleMatcher = options.ruleMatcher ?? null;
    this.telemetrySchedule = options.telemetrySchedule ?? CRON_CONFIG.TELEMETRY;

    this.registry = new SensorRegistry({
      driverFactory: options.driverFactory,
      callTimeoutMs: options.hardwareTimeoutMs,
    });
    this.rules = new RuleCache(() => this.platformApi.getRules(this.identity.device_id, this.identity.network_id));
    this.dispatcher = new Dispatcher({
      getDeviceInfo: () => this.deviceInfo,
      getHandler: () => this.handler,
      refreshRules: () => this.updateRules(),
      refreshDevice: () => this.updateDevice(),
      processSensorCommand: (command) => processCommand(this.registry, command),
      sign: (payload) => this.sign(payload),
      publish: (topic, message) => this.transport.publish(topic, message),
    });
  }

  // --- Connection lifecycle ---

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    // Reject a bad schedule before anything is opened
    if (this.telemetrySchedule !== false) {
      assertTelemetrySchedule(this.telemetrySchedule);
    }
    this.started = true;

    try {
      await this.updateDevice();
    } catch (error) {
      logger.error(`Failed to fetch device info: ${getErrorMessage(error)}`);
    }
    try {
      await this.updateRules();
    } catch (error) {
      logger.error(`Failed to fetch rules: ${getErrorMessage(error)}`);
    }

    this.transport.connect((raw) => {
      this.dispatcher.onReceive(raw).catch((error: unknown) => {
        logger.error(`Dispatch failed: ${getErrorMessage(error)}`);
      });
    });
    this.transport.subscribe(this.topic);

    if (this.telemetrySchedule !== false) {
      this.telemetryTask = startTelemetryJob(this.telemetryDeps(), this.telemetrySchedule);
    }

    logger.notify(`Device ${this.identity.device_id} started on ${this.identity.network_id}`);
  }

  /** Stop telemetry, let the in-flight command finish, flush config saves, then disconnect. */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;

    this.telemetryTask?.stop();
    this.telemetryTask = null;

    await this.dispatcher.drain();
    await this.registry.flushPersistence();
    this.transport.disconnect();

    logger.notify(`Device ${this.identity.device_id} stopped`);
  }

  /** Stop, then release every sensor handle. The agent cannot read sensors afterwards. */
  async close(): Promise<void> {
    await this.stop();
    await this.registry.close();
  }

  /** Resolves once every command received so far has been handled. */
  whenIdle(): Promise<void> {
    return this.dispatcher.drain();
  }

  onMessage(handler: CommandHandler): void {
    this.handler = handler;
  }

  publish(topic: string, message: unknown): void {
    this.transport.publish(topic, this.sign(message));
  }

  // --- Device state ---

  updateData(key: string, value: unknown): void {
    this.deviceData[key] = value;
  }

  getData(): Record<string, unknown> {
    return { ...this.deviceData };
  }

  getDeviceInfo(): DeviceInfo | null {
    return this.deviceInfo;
  }

  getRules(): Rule[] {
    return this.rules.list();
  }

  updateRules(): Promise<Rule[]> {
    return this.rules.refresh();
  }

  async updateDevice(): Promise<DeviceInfo> {
    const info = await this.platformApi.getDeviceInfo(this.identity.device_id, this.identity.network_id);
    this.deviceInfo = info;
    return info;
  }

  /**
   * Publish the action of every cached rule whose condition matches `data`.
   * @returns the rules that fired
   */
  async processRules(data: Record<string, unknown>): Promise<Rule[]> {
    if (this.rules.size === 0) {
      await this.updateRules();
    }
    if (!this.ruleMatcher) {
      logger.debug('No rule matcher configured, skipping rule evaluation');
      return [];
    }

    const fired: Rule[] = [];
    for (const rule of this.rules.list()) {
      try {
        if (this.ruleMatcher.matches(rule.rule, data)) {
          this.publish(rule.action.topic, rule.action.message);
          fired.push(rule);
        }
      } catch (error) {
        logger.error(`Rule evaluation failed: ${getErrorMessage(error)}`);
      }
    }
    return fired;
  }

  // --- Sensors ---

  addSensor(
    sensorId: string,
    sensorType: string,
    inputs: SensorInputs = {},
    enabled = true,
    alias?: string
  ): Promise<boolean> {
    return this.registry.addSensor({ sensor_id: sensorId, sensor_type: sensorType, inputs, enabled, alias });
  }

  removeSensor(sensorId: string): Promise<boolean> {
    return this.registry.removeSensor(sensorId);
  }

  readSensor(sensorId: string): Promise<SensorReading> {
    return this.registry.readSensor(sensorId);
  }

  readAllSensors(): Promise<SensorReading[]> {
    return this.registry.readAllSensors();
  }

  executeSensorAction(sensorId: string, action: string, params: Record<string, unknown> = {}): Promise<ActionResult> {
    return this.registry.executeSensorAction(sensorId, action, params);
  }

  getSensorStatus(sensorId?: string): Promise<SensorStatus | SensorStatusError | AllSensorsStatus> {
    return this.registry.getSensorStatus(sensorId);
  }

  enableSensor(sensorId: string): Promise<boolean> {
    return this.registry.enableSensor(sensorId);
  }

  disableSensor(sensorId: string): Promise<boolean> {
    return this.registry.disableSensor(sensorId);
  }

  loadSensorConfigs(configs: unknown[]): Promise<string[]> {
    return this.registry.loadSensorConfigs(configs);
  }

  configureSensor(sensorId: string, config: Record<string, unknown>): Promise<ConfigureResult> {
    return this.registry.configureSensor(sensorId, config);
  }

  processSensorCommand(command: SensorCommand): Promise<SensorCommandResult> {
    return processCommand(this.registry, command);
  }

  setConfigSaveHook(hook: ConfigSaveHook | null): void {
    this.registry.setConfigSaveHook(hook);
  }

  async publishSensorReading(sensorId: string, topic: string = this.topic): Promise<SensorReading> {
    const reading = await this.registry.readSensor(sensorId);
    this.publish(topic, reading);
    return reading;
  }

  async publishAllSensorReadings(topic: string = this.topic): Promise<TelemetryPayload> {
    const payload = buildTelemetryPayload(this.identity.device_id, await this.registry.readAllSensors());
    this.publish(topic, payload);
    return payload;
  }

  private sign(payload: unknown): SignedCommand {
    return makeCommand(payload, this.identity.key_pair);
  }

  private telemetryDeps(): TelemetryDeps {
    return {
      deviceId: this.identity.device_id,
      readAll: () => this.registry.readAllSensors(),
      sign: (payload) => this.sign(payload),
      publish: (topic, message) => this.transport.publish(topic, message),
    };
  }
}
