import { parseSensorAction, SensorRegistry } from '@/services/sensor-registry.service';
import { SensorConfig, SensorDriverFactory, SensorHandle, SensorStatus } from '@/types/sensor.types';
import { hostDriverFactory } from '@/drivers/host-driver.factory';
import { FakeDriverFactory } from '../helpers/fakes';

const CLOCK = 1_700_000_000;

const config = (overrides: Partial<SensorConfig> = {}): SensorConfig => ({
  sensor_id: 'temp_1',
  sensor_type: 'thermo',
  inputs: {},
  enabled: true,
  ...overrides,
});

describe('SensorRegistry', () => {
  let factory: FakeDriverFactory;
  let registry: SensorRegistry;

  beforeEach(() => {
    factory = new FakeDriverFactory();
    registry = new SensorRegistry({ driverFactory: factory, callTimeoutMs: 50, clock: () => CLOCK });
  });

  describe('add', () => {
    test('should instantiate an enabled sensor', async () => {
      expect(await registry.addSensor(config())).toBe(true);
      expect(registry.getState('temp_1')).toBe('registered-enabled');
      expect(factory.state.created).toBe(1);
    });

    test('should store a disabled sensor without instantiating it', async () => {
      expect(await registry.addSensor(config({ enabled: false }))).toBe(true);
      expect(registry.getState('temp_1')).toBe('registered-disabled');
      expect(factory.state.created).toBe(0);
    });

    test('should leave no state behind when the driver fails', async () => {
      expect(await registry.addSensor(config({ sensor_type: 'broken' }))).toBe(false);
      expect(registry.getState('temp_1')).toBe('absent');
      expect(registry.getConfigs()).toEqual([]);
    });

    test('should close a driver that finishes opening after the timeout', async () => {
      let closed = 0;
      const lateFactory: SensorDriverFactory = {
        create: () =>
          new Promise<SensorHandle>((resolve) => {
            const handle: SensorHandle = {
              read: () => ({}),
              close: () => {
                closed++;
              },
            };
            setTimeout(() => resolve(handle), 60);
          }),
      };
      const lagging = new SensorRegistry({ driverFactory: lateFactory, callTimeoutMs: 20, clock: () => CLOCK });

      expect(await lagging.addSensor(config())).toBe(false);
      expect(lagging.getState('temp_1')).toBe('absent');
      expect(closed).toBe(0);

      await new Promise((resolve) => setTimeout(resolve, 100));
      expect(closed).toBe(1);
    });

    test('should keep the existing sensor when a replacement fails', async () => {
      await registry.addSensor(config());
      expect(await registry.addSensor(config({ sensor_type: 'broken' }))).toBe(false);
      expect(registry.getConfigs()[0].sensor_type).toBe('thermo');
      expect(registry.hasInstance('temp_1')).toBe(true);
    });

    test('should close the old handle when replaced', async () => {
      await registry.addSensor(config());
      await registry.addSensor(config({ inputs: { value: 30 } }));
      expect(factory.state.closed).toBe(1);
      expect((await registry.readSensor('temp_1')).data).toEqual({ temperature: 30 });
    });

    test('should not persist on add', async () => {
      const hook = jest.fn();
      registry.setConfigSaveHook(hook);
      await registry.addSensor(config());
      await registry.flushPersistence();
      expect(hook).not.toHaveBeenCalled();
    });

    test('should read a host CPU temperature sensor', async () => {
      const host = new SensorRegistry({
        driverFactory: {
          create: (type, inputs) =>
            type === 'vcgen' ? { read: () => ({ temperature: 48.3 }) } : hostDriverFactory.create(type, inputs),
        },
      });

      expect(await host.addSensor({ sensor_id: 'cpu_temp', sensor_type: 'vcgen', inputs: {}, enabled: true })).toBe(true);
      const reading = await host.readSensor('cpu_temp');
      expect(reading.status).toBe('success');
      expect(reading.data).toEqual({ temperature: 48.3 });
    });
  });

  describe('enable / disable / remove', () => {
    test('should leave the sensor registered but disabled when enable fails', async () => {
      await registry.addSensor(config({ sensor_type: 'broken', enabled: false }));

      expect(await registry.enableSensor('temp_1')).toBe(false);
      expect(registry.getState('temp_1')).toBe('registered-disabled');
      expect(registry.getConfigs()[0].enabled).toBe(false);
    });

    test('should leave an unknown sensor absent when enabling it', async () => {
      expect(await registry.enableSensor('ghost')).toBe(false);
      expect(registry.getState('ghost')).toBe('absent');
    });

    test('should enable a disabled sensor and persist', async () => {
      const hook = jest.fn();
      registry.setConfigSaveHook(hook);
      await registry.addSensor(config({ enabled: false }));

      expect(await registry.enableSensor('temp_1')).toBe(true);
      await registry.flushPersistence();

      expect(registry.getState('temp_1')).toBe('registered-enabled');
      expect(hook).toHaveBeenCalledWith([config({ enabled: true })]);
    });

    test('should read a disabled sensor as an error with no instance', async () => {
      await registry.addSensor(config());

      expect(await registry.disableSensor('temp_1')).toBe(true);
      const reading = await registry.readSensor('temp_1');

      expect(reading.status).toBe('error');
      expect(reading.error).toBe('Sensor temp_1 is disabled');
      expect(registry.hasInstance('temp_1')).toBe(false);
      expect(factory.state.closed).toBe(1);
    });

    test('should return false when disabling an unknown sensor', async () => {
      expect(await registry.disableSensor('ghost')).toBe(false);
    });

    test('should remove config and instance and persist', async () => {
      const hook = jest.fn();
      registry.setConfigSaveHook(hook);
      await registry.addSensor(config());

      expect(await registry.removeSensor('temp_1')).toBe(true);
      await registry.flushPersistence();

      expect(registry.getState('temp_1')).toBe('absent');
      expect(factory.state.closed).toBe(1);
      expect(hook).toHaveBeenCalledWith([]);
    });

    test('should survive a failing save hook', async () => {
      registry.setConfigSaveHook(() => Promise.reject(new Error('disk full')));
      await registry.addSensor(config());

      expect(await registry.disableSensor('temp_1')).toBe(true);
      await expect(registry.flushPersistence()).resolves.toBeUndefined();
      expect(registry.getConfigs()[0].enabled).toBe(false);
    });
  });

  describe('configure', () => {
    test('should create a sensor', async () => {
      const result = await registry.configureSensor('temp_2', { sensor_type: 'thermo', inputs: { value: 5 } });

      expect(result).toEqual({
        status: 'success',
        sensor_id: 'temp_2',
        config: { sensor_id: 'temp_2', sensor_type: 'thermo', inputs: { value: 5 }, enabled: true },
        timestamp: CLOCK,
      });
      expect(registry.getState('temp_2')).toBe('registered-enabled');
    });

    test('should require sensor_type for a new sensor', async () => {
      const result = await registry.configureSensor('temp_2', { inputs: {} });
      expect(result).toEqual({
        status: 'error',
        error: 'sensor_type is required when creating a new sensor',
        timestamp: CLOCK,
      });
    });

    test('should merge supplied fields over the existing config', async () => {
      await registry.addSensor(config({ alias: 'Kitchen', inputs: { value: 1 } }));

      const result = await registry.configureSensor('temp_1', { inputs: { value: 2 } });

      expect(result.config).toEqual(config({ alias: 'Kitchen', inputs: { value: 2 } }));
      expect((await registry.readSensor('temp_1')).data).toEqual({ temperature: 2 });
      expect(factory.state.closed).toBe(1);
    });

    test('should keep the prior config and instance when reconfigure fails', async () => {
      const hook = jest.fn();
      registry.setConfigSaveHook(hook);
      await registry.addSensor(config({ inputs: { value: 7 } }));
      const before = registry.getConfigs();

      const result = await registry.configureSensor('temp_1', { sensor_type: 'broken' });

      expect(result.status).toBe('error');
      expect(result.error).toBe('Failed to configure sensor temp_1: cannot open broken');
      expect(registry.getConfigs()).toEqual(before);
      expect(registry.getState('temp_1')).toBe('registered-enabled');
      expect((await registry.readSensor('temp_1')).data).toEqual({ temperature: 7 });
      expect(factory.state.closed).toBe(0);
      await registry.flushPersistence();
      expect(hook).not.toHaveBeenCalled();
    });

    test('should disable through configure and persist', async () => {
      const hook = jest.fn();
      registry.setConfigSaveHook(hook);
      await registry.addSensor(config());

      const result = await registry.configureSensor('temp_1', { enabled: false });
      await registry.flushPersistence();

      expect(result.status).toBe('success');
      expect(registry.getState('temp_1')).toBe('registered-disabled');
      expect(hook).toHaveBeenCalledTimes(1);
    });

    test('should reject malformed fields', async () => {
      const result = await registry.configureSensor('temp_1', { sensor_type: 'thermo', enabled: 'yes' });
      expect(result).toEqual({
        status: 'error',
        error: 'Invalid configuration for sensor temp_1: enabled must be a boolean',
        timestamp: CLOCK,
      });
    });
  });

  describe('reads', () => {
    test('should report a missing sensor with type unknown', async () => {
      expect(await registry.readSensor('missing')).toEqual({
        sensor_id: 'missing',
        sensor_type: 'unknown',
        data: {},
        timestamp: CLOCK,
        status: 'error',
        error: 'Sensor missing not found',
      });
    });

    test('should convert driver errors into error readings', async () => {
      await registry.addSensor(config({ sensor_id: 'bad', sensor_type: 'flaky' }));
      const reading = await registry.readSensor('bad');
      expect(reading.status).toBe('error');
      expect(reading.error).toBe('bus error');
    });

    test('should time out hung reads', async () => {
      await registry.addSensor(config({ sensor_id: 'hung', sensor_type: 'slow' }));
      const reading = await registry.readSensor('hung');
      expect(reading.status).toBe('error');
      expect(reading.error).toBe('read hung timed out after 50ms');
    });

    test('should read all enabled sensors in registration order', async () => {
      await registry.addSensor(config({ sensor_id: 'b', inputs: { value: 2 } }));
      await registry.addSensor(config({ sensor_id: 'off', enabled: false }));
      await registry.addSensor(config({ sensor_id: 'a', inputs: { value: 1 } }));

      const readings = await registry.readAllSensors();

      expect(readings.map((r) => r.sensor_id)).toEqual(['b', 'a']);
      expect(readings.map((r) => r.data)).toEqual([{ temperature: 2 }, { temperature: 1 }]);
    });
  });

  describe('execute', () => {
    test('should drive a display capability', async () => {
      await registry.addSensor(config({ sensor_id: 'lcd_1', sensor_type: 'lcd' }));

      const result = await registry.executeSensorAction('lcd_1', 'display_text', { text: 'Hello' });
      await registry.executeSensorAction('lcd_1', 'append_text', { text: '!' });
      await registry.executeSensorAction('lcd_1', 'clear');

      expect(result).toEqual({ status: 'success', action: 'display_text', params: { text: 'Hello' }, timestamp: CLOCK });
      expect(factory.calls).toEqual(['displayText:Hello:true', 'appendText:!', 'clear']);
    });

    test('should drive an output capability', async () => {
      await registry.addSensor(config({ sensor_id: 'relay_1', sensor_type: 'relay' }));

      await registry.executeSensorAction('relay_1', 'toggle');
      expect((await registry.readSensor('relay_1')).data).toEqual({ value: true });

      await registry.executeSensorAction('relay_1', 'set_output', { value: false });
      expect((await registry.readSensor('relay_1')).data).toEqual({ value: false });
    });

    test('should reject an action the sensor lacks', async () => {
      await registry.addSensor(config());
      expect(await registry.executeSensorAction('temp_1', 'toggle')).toEqual({
        status: 'error',
        error: "Action 'toggle' not supported for sensor temp_1 of type thermo",
        timestamp: CLOCK,
      });
    });

    test('should reject an unknown verb', async () => {
      await registry.addSensor(config({ sensor_id: 'lcd_1', sensor_type: 'lcd' }));
      const result = await registry.executeSensorAction('lcd_1', 'explode');
      expect(result.error).toBe("Action 'explode' not supported for sensor lcd_1 of type lcd");
    });

    test('should reject missing and disabled sensors', async () => {
      await registry.addSensor(config({ enabled: false }));
      expect((await registry.executeSensorAction('ghost', 'toggle')).error).toBe('Sensor ghost not found');
      expect((await registry.executeSensorAction('temp_1', 'toggle')).error).toBe('Sensor temp_1 is disabled');
    });
  });

  describe('status', () => {
    test('should describe a single sensor', async () => {
      await registry.addSensor(config({ alias: 'Kitchen' }));
      expect(await registry.getSensorStatus('temp_1')).toEqual({
        sensor_id: 'temp_1',
        sensor_type: 'thermo',
        enabled: true,
        alias: 'Kitchen',
        inputs: {},
        initialized: true,
        timestamp: CLOCK,
      });
    });

    test('should report a missing sensor', async () => {
      expect(await registry.getSensorStatus('ghost')).toEqual({
        status: 'error',
        error: 'Sensor ghost not found',
        timestamp: CLOCK,
      });
    });

    test('should summarise all sensors', async () => {
      await registry.addSensor(config());
      await registry.addSensor(config({ sensor_id: 'off', enabled: false }));

      const status = await registry.getSensorStatus();
      const sensors: SensorStatus[] = status.sensors;

      expect(status.total_sensors).toBe(2);
      expect(sensors.map((s) => [s.sensor_id, s.enabled, s.initialized])).toEqual([
        ['temp_1', true, true],
        ['off', false, false],
      ]);
    });
  });

  describe('loadSensorConfigs', () => {
    test('should load valid entries and skip the rest', async () => {
      const loaded = await registry.loadSensorConfigs([
        { sensor_id: 'a', sensor_type: 'thermo' },
        { sensor_type: 'thermo' },
        { sensor_id: 'b', sensor_type: 'broken' },
        { sensor_id: 'c', sensor_type: 'thermo', enabled: false },
      ]);

      expect(loaded).toEqual(['a', 'c']);
      expect(registry.getState('a')).toBe('registered-enabled');
      expect(registry.getState('c')).toBe('registered-disabled');
    });
  });

  test('close should release every handle and keep configs', async () => {
    await registry.addSensor(config({ sensor_id: 'a' }));
    await registry.addSensor(config({ sensor_id: 'b' }));

    await registry.close();

    expect(factory.state.closed).toBe(2);
    expect(registry.getConfigs()).toHaveLength(2);
  });
});

describe('parseSensorAction', () => {
  test('should default display_text to clearing', () => {
    expect(parseSensorAction('display_text', { text: 'Hi' })).toEqual({ kind: 'display_text', text: 'Hi', clear: true });
    expect(parseSensorAction('display_text', { text: 'Hi', clear: false })).toEqual({
      kind: 'display_text',
      text: 'Hi',
      clear: false,
    });
  });

  test('should coerce set_output values', () => {
    expect(parseSensorAction('set_output', { value: 1 })).toEqual({ kind: 'set_output', value: true });
    expect(parseSensorAction('set_output', {})).toEqual({ kind: 'set_output', value: false });
  });

  test('should return null for unknown verbs', () => {
    expect(parseSensorAction('read', {})).toBeNull();
  });
});
