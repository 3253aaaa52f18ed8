import {
  ActionResult,
  AllSensorsStatus,
  ConfigSaveHook,
  ConfigureResult,
  SensorAction,
  SensorConfig,
  SensorDriverFactory,
  SensorHandle,
  SensorReading,
  SensorStatus,
  SensorStatusError,
} from '@/types/sensor.types';
import { HARDWARE_CONFIG } from '@/config/constants';
import { sensorConfigUpdateSchema, validateSensorConfig } from './sensor-config.service';
import { SerialQueue } from '@/utils/serial-queue.utils';
import { withTimeout } from '@/utils/timeout.utils';
import { HardwareTimeoutError, getErrorMessage } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

export type SensorState = 'absent' | 'registered-disabled' | 'registered-enabled';

export interface SensorRegistryOptions {
  driverFactory: SensorDriverFactory;
  callTimeoutMs?: number;
  clock?: () => number;       // Unix seconds
}

const cloneConfig = (config: SensorConfig): SensorConfig => ({
  ...config,
  inputs: { ...config.inputs },
});

/**
 * Map a wire verb and its params onto a typed action.
 * @returns null for verbs no capability implements
 */
export function parseSensorAction(verb: string, params: Record<string, unknown>): SensorAction | null {
  const text = params.text === undefined || params.text === null ? '' : String(params.text);

  switch (verb) {
    case 'display_text':
      return { kind: 'display_text', text, clear: params.clear === undefined ? true : Boolean(params.clear) };
    case 'append_text':
      return { kind: 'append_text', text };
    case 'clear':
      return { kind: 'clear' };
    case 'toggle':
      return { kind: 'toggle' };
    case 'set_output':
      return { kind: 'set_output', value: Boolean(params.value ?? false) };
    default:
      return null;
  }
}

/**
 * Owns every configured sensor and its live driver handle.
 *
 * Per sensor id the registry is in one of three states: absent,
 * registered-disabled (config only) or registered-enabled (config + handle).
 * All public operations run through a single queue, so the telemetry job and
 * the command dispatcher never interleave on the sensor table.
 */
export class SensorRegistry {
  private readonly configs = new Map<string, SensorConfig>();
  private readonly instances = new Map<string, SensorHandle>();
  private readonly queue = new SerialQueue();
  private readonly driverFactory: SensorDriverFactory;
  private readonly callTimeoutMs: number;
  private readonly clock: () => number;
  private saveHook: ConfigSaveHook | null = null;
  private pendingSave: Promise<void> = Promise.resolve();

  constructor(options: SensorRegistryOptions) {
    this.driverFactory = options.driverFactory;
    this.callTimeoutMs = options.callTimeoutMs ?? HARDWARE_CONFIG.CALL_TIMEOUT_MS;
    this.clock = options.clock ?? (() => Date.now() / 1000);
  }

  setConfigSaveHook(hook: ConfigSaveHook | null): void {
    this.saveHook = hook;
  }

  getState(sensorId: string): SensorState {
    const config = this.configs.get(sensorId);
    if (!config) {
      return 'absent';
    }
    return config.enabled && this.instances.has(sensorId) ? 'registered-enabled' : 'registered-disabled';
  }

  hasInstance(sensorId: string): boolean {
    return this.instances.has(sensorId);
  }

  getConfigs(): SensorConfig[] {
    return [...this.configs.values()].map(cloneConfig);
  }

  /** Resolves once the most recent save hook call has settled. */
  flushPersistence(): Promise<void> {
    return this.pendingSave;
  }

  // --- Lifecycle ---

  addSensor(config: SensorConfig): Promise<boolean> {
    return this.queue.run(() => this.add(cloneConfig(config)));
  }

  removeSensor(sensorId: string): Promise<boolean> {
    return this.queue.run(async () => {
      const handle = this.instances.get(sensorId);
      this.instances.delete(sensorId);
      this.configs.delete(sensorId);
      if (handle) {
        await this.destroy(sensorId, handle);
      }
      logger.info(`Removed sensor ${sensorId}`);
      this.persistConfigs();
      return true;
    });
  }

  enableSensor(sensorId: string): Promise<boolean> {
    return this.queue.run(async () => {
      const config = this.configs.get(sensorId);
      if (!config) {
        return false;
      }
      if (config.enabled && this.instances.has(sensorId)) {
        return true;
      }

      const enabled = { ...cloneConfig(config), enabled: true };
      let handle: SensorHandle;
      try {
        handle = await this.instantiate(enabled);
      } catch (error) {
        logger.error(`Failed to enable sensor ${sensorId}: ${getErrorMessage(error)}`);
        return false;
      }

      this.configs.set(sensorId, enabled);
      this.instances.set(sensorId, handle);
      logger.info(`Enabled sensor ${sensorId}`);
      this.persistConfigs();
      return true;
    });
  }

  disableSensor(sensorId: string): Promise<boolean> {
    return this.queue.run(async () => {
      const config = this.configs.get(sensorId);
      if (!config) {
        return false;
      }

      this.configs.set(sensorId, { ...config, enabled: false });
      const handle = this.instances.get(sensorId);
      this.instances.delete(sensorId);
      if (handle) {
        await this.destroy(sensorId, handle);
      }
      logger.info(`Disabled sensor ${sensorId}`);
      this.persistConfigs();
      return true;
    });
  }

  /**
   * Create-or-update. Supplied fields are merged over the stored config.
   * If the merged config is enabled and its driver cannot be opened, the
   * prior config and handle stay in place and an error result is returned.
   */
  configureSensor(sensorId: string, update: unknown): Promise<ConfigureResult> {
    return this.queue.run(async (): Promise<ConfigureResult> => {
      const parsed = sensorConfigUpdateSchema.safeParse(update ?? {});
      if (!parsed.success) {
        return {
          status: 'error',
          error: `Invalid configuration for sensor ${sensorId}: ${parsed.error.issues[0]?.message}`,
          timestamp: this.clock(),
        };
      }

      const changes = parsed.data;
      const existing = this.configs.get(sensorId);
      const sensorType = changes.sensor_type ?? existing?.sensor_type;
      if (!sensorType) {
        return {
          status: 'error',
          error: 'sensor_type is required when creating a new sensor',
          timestamp: this.clock(),
        };
      }

      const updated: SensorConfig = {
        sensor_id: sensorId,
        sensor_type: sensorType,
        inputs: { ...(changes.inputs ?? existing?.inputs ?? {}) },
        enabled: changes.enabled ?? existing?.enabled ?? true,
      };
      const alias = changes.alias === undefined ? existing?.alias : changes.alias;
      if (alias) {
        updated.alias = alias;
      }

      // The previous handle stays open until the new one is up, so a failed
      // reconfigure leaves the sensor exactly as it was.
      const previous = this.instances.get(sensorId);
      if (updated.enabled) {
        let handle: SensorHandle;
        try {
          handle = await this.instantiate(updated);
        } catch (error) {
          logger.error(`Failed to configure sensor ${sensorId}: ${getErrorMessage(error)}`);
          return {
            status: 'error',
            error: `Failed to configure sensor ${sensorId}: ${getErrorMessage(error)}`,
            timestamp: this.clock(),
          };
        }
        this.instances.set(sensorId, handle);
      } else {
        this.instances.delete(sensorId);
      }
      this.configs.set(sensorId, updated);

      if (previous) {
        await this.destroy(sensorId, previous);
      }

      logger.info(`Configured sensor ${sensorId} (${updated.sensor_type}, ${updated.enabled ? 'enabled' : 'disabled'})`);
      this.persistConfigs();

      return {
        status: 'success',
        sensor_id: sensorId,
        config: cloneConfig(updated),
        timestamp: this.clock(),
      };
    });
  }

  /**
   * Load many configurations at once (startup). Invalid entries and entries
   * whose driver fails are skipped.
   * @returns ids that were registered
   */
  loadSensorConfigs(entries: unknown[]): Promise<string[]> {
    return this.queue.run(async () => {
      const loaded: string[] = [];
      for (const entry of entries) {
        const validation = validateSensorConfig(entry);
        if (!validation.valid || !validation.config) {
          logger.error(`Failed to load sensor config ${JSON.stringify(entry)}: ${validation.error}`);
          continue;
        }
        if (await this.add(validation.config)) {
          loaded.push(validation.config.sensor_id);
        }
      }
      return loaded;
    });
  }

  /** Close every live handle; configurations are kept. */
  close(): Promise<void> {
    return this.queue.run(async () => {
      const handles = [...this.instances.entries()];
      this.instances.clear();
      for (const [sensorId, handle] of handles) {
        await this.destroy(sensorId, handle);
      }
    });
  }

  // --- Reads and actions ---

  readSensor(sensorId: string): Promise<SensorReading> {
    return this.queue.run(() => this.read(sensorId));
  }

  readAllSensors(): Promise<SensorReading[]> {
    return this.queue.run(async () => {
      const readings: SensorReading[] = [];
      for (const [sensorId, config] of this.configs) {
        if (config.enabled && this.instances.has(sensorId)) {
          readings.push(await this.read(sensorId));
        }
      }
      return readings;
    });
  }

  executeSensorAction(sensorId: string, verb: string, params: Record<string, unknown> = {}): Promise<ActionResult> {
    return this.queue.run(async (): Promise<ActionResult> => {
      const config = this.configs.get(sensorId);
      if (!config) {
        return { status: 'error', error: `Sensor ${sensorId} not found`, timestamp: this.clock() };
      }
      const handle = this.instances.get(sensorId);
      if (!config.enabled || !handle) {
        return { status: 'error', error: `Sensor ${sensorId} is disabled`, timestamp: this.clock() };
      }

      const unsupported: ActionResult = {
        status: 'error',
        error: `Action '${verb}' not supported for sensor ${sensorId} of type ${config.sensor_type}`,
        timestamp: this.clock(),
      };

      const action = parseSensorAction(verb, params);
      if (!action) {
        return unsupported;
      }

      try {
        const performed = await withTimeout(`${verb} on ${sensorId}`, () => this.perform(handle, action), this.callTimeoutMs);
        if (!performed) {
          return unsupported;
        }
      } catch (error) {
        logger.error(`Failed to execute action ${verb} on sensor ${sensorId}: ${getErrorMessage(error)}`);
        return { status: 'error', error: getErrorMessage(error), timestamp: this.clock() };
      }

      return { status: 'success', action: verb, params, timestamp: this.clock() };
    });
  }

  getSensorStatus(): Promise<AllSensorsStatus>;
  getSensorStatus(sensorId: string): Promise<SensorStatus | SensorStatusError>;
  getSensorStatus(sensorId?: string): Promise<SensorStatus | SensorStatusError | AllSensorsStatus>;
  getSensorStatus(sensorId?: string): Promise<SensorStatus | SensorStatusError | AllSensorsStatus> {
    return this.queue.run((): SensorStatus | SensorStatusError | AllSensorsStatus => {
      if (sensorId) {
        const config = this.configs.get(sensorId);
        if (!config) {
          return { status: 'error', error: `Sensor ${sensorId} not found`, timestamp: this.clock() };
        }
        return this.describe(config);
      }

      return {
        total_sensors: this.configs.size,
        sensors: [...this.configs.values()].map((config) => this.describe(config)),
        timestamp: this.clock(),
      };
    });
  }

  // --- Internals (callers hold the queue) ---

  private async add(config: SensorConfig): Promise<boolean> {
    const sensorId = config.sensor_id;
    const previous = this.instances.get(sensorId);

    if (!config.enabled) {
      this.configs.set(sensorId, config);
      this.instances.delete(sensorId);
      if (previous) {
        await this.destroy(sensorId, previous);
      }
      logger.info(`Registered disabled sensor ${sensorId}`);
      return true;
    }

    let handle: SensorHandle;
    try {
      handle = await this.instantiate(config);
    } catch (error) {
      logger.error(`Failed to add sensor ${sensorId}: ${getErrorMessage(error)}`);
      return false;
    }

    this.instances.set(sensorId, handle);
    this.configs.set(sensorId, config);
    if (previous) {
      await this.destroy(sensorId, previous);
    }
    logger.info(`Added sensor ${sensorId} of type ${config.sensor_type}`);
    return true;
  }

  private async read(sensorId: string): Promise<SensorReading> {
    const config = this.configs.get(sensorId);
    if (!config) {
      return this.errorReading(sensorId, 'unknown', `Sensor ${sensorId} not found`);
    }
    const handle = this.instances.get(sensorId);
    if (!config.enabled || !handle) {
      return this.errorReading(sensorId, config.sensor_type, `Sensor ${sensorId} is disabled`);
    }

    try {
      const data = await withTimeout(`read ${sensorId}`, () => handle.read(), this.callTimeoutMs);
      return {
        sensor_id: sensorId,
        sensor_type: config.sensor_type,
        data: { ...data },
        timestamp: this.clock(),
        status: 'success',
      };
    } catch (error) {
      logger.error(`Failed to read sensor ${sensorId}: ${getErrorMessage(error)}`);
      return this.errorReading(sensorId, config.sensor_type, getErrorMessage(error));
    }
  }

  private async perform(handle: SensorHandle, action: SensorAction): Promise<boolean> {
    switch (action.kind) {
      case 'display_text':
        if (!handle.display) return false;
        await handle.display.displayText(action.text, action.clear);
        return true;
      case 'append_text':
        if (!handle.display) return false;
        await handle.display.appendText(action.text);
        return true;
      case 'clear':
        if (!handle.display) return false;
        await handle.display.clear();
        return true;
      case 'toggle':
        if (!handle.output) return false;
        await handle.output.toggle();
        return true;
      case 'set_output':
        if (!handle.output) return false;
        await handle.output.setValue(action.value);
        return true;
    }
  }

  private async instantiate(config: SensorConfig): Promise<SensorHandle> {
    const opening = Promise.resolve().then(() => this.driverFactory.create(config.sensor_type, { ...config.inputs }));
    try {
      return await withTimeout(`create ${config.sensor_type} for ${config.sensor_id}`, () => opening, this.callTimeoutMs);
    } catch (error) {
      if (error instanceof HardwareTimeoutError) {
        // Nothing owns a handle that opens after the deadline
        opening
          .then((late) => this.destroy(config.sensor_id, late))
          .catch((lateError: unknown) => {
            logger.debug(`Late driver for ${config.sensor_id} failed: ${getErrorMessage(lateError)}`);
          });
      }
      throw error;
    }
  }

  private async destroy(sensorId: string, handle: SensorHandle): Promise<void> {
    if (!handle.close) {
      return;
    }
    const close = handle.close.bind(handle);
    try {
      await withTimeout(`close ${sensorId}`, () => close(), this.callTimeoutMs);
    } catch (error) {
      logger.warn(`Failed to close sensor ${sensorId}: ${getErrorMessage(error)}`);
    }
  }

  private describe(config: SensorConfig): SensorStatus {
    return {
      sensor_id: config.sensor_id,
      sensor_type: config.sensor_type,
      enabled: config.enabled,
      alias: config.alias ?? null,
      inputs: { ...config.inputs },
      initialized: this.instances.has(config.sensor_id),
      timestamp: this.clock(),
    };
  }

  private errorReading(sensorId: string, sensorType: string, error: string): SensorReading {
    return {
      sensor_id: sensorId,
      sensor_type: sensorType,
      data: {},
      timestamp: this.clock(),
      status: 'error',
      error,
    };
  }

  private persistConfigs(): void {
    const hook = this.saveHook;
    if (!hook) {
      return;
    }
    const snapshot = this.getConfigs();
    this.pendingSave = this.pendingSave
      .then(() => hook(snapshot))
      .catch((error: unknown) => {
        logger.error(`Failed to persist sensor configuration: ${getErrorMessage(error)}`);
      });
  }
}
