import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { SensorData, SensorDriverFactory, SensorHandle, SensorInputs } from '@/types/sensor.types';
import { AgentError } from '@/utils/errors.utils';

export const THERMAL_ZONE_PATH = '/sys/class/thermal/thermal_zone0/temp';

const round = (value: number, digits = 2): number => Number(value.toFixed(digits));

const numberInput = (inputs: SensorInputs, key: string, fallback: number): number => {
  const value = inputs[key];
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
};

// CPU temperature from the kernel thermal zone (millidegrees Celsius)
function createCpuTemperature(inputs: SensorInputs): SensorHandle {
  const zonePath = typeof inputs.path === 'string' ? inputs.path : THERMAL_ZONE_PATH;
  return {
    async read(): Promise<SensorData> {
      const raw = await fs.readFile(zonePath, 'utf8');
      const milli = Number.parseInt(raw.trim(), 10);
      if (Number.isNaN(milli)) {
        throw new Error(`Unexpected thermal reading: ${raw.trim()}`);
      }
      return { temperature: round(milli / 1000, 1) };
    },
  };
}

function createSystemMonitor(): SensorHandle {
  return {
    read(): SensorData {
      const [load1, load5, load15] = os.loadavg();
      const total = os.totalmem();
      const free = os.freemem();
      return {
        load_1m: round(load1),
        load_5m: round(load5),
        load_15m: round(load15),
        memory_used_percent: round(((total - free) / total) * 100, 1),
        uptime: Math.floor(os.uptime()),
      };
    },
  };
}

/**
 * Character display kept in memory; reads return the visible lines.
 */
export function createVirtualDisplay(inputs: SensorInputs): SensorHandle {
  const columns = numberInput(inputs, 'columns', 16);
  const rows = numberInput(inputs, 'rows', 2);
  let buffer = '';

  const lines = (): string[] => {
    const wrapped: string[] = [];
    for (let i = 0; i < buffer.length && wrapped.length < rows; i += columns) {
      wrapped.push(buffer.slice(i, i + columns));
    }
    return wrapped;
  };

  return {
    read: () => ({ text: buffer, lines: lines() }),
    display: {
      displayText(text: string, clear: boolean) {
        buffer = clear ? text : buffer + text;
      },
      appendText(text: string) {
        buffer += text;
      },
      clear() {
        buffer = '';
      },
    },
    close() {
      buffer = '';
    },
  };
}

export function createVirtualRelay(inputs: SensorInputs): SensorHandle {
  let value = inputs.initial_value === true;
  return {
    read: () => ({ value }),
    output: {
      toggle() {
        value = !value;
      },
      setValue(next: boolean) {
        value = next;
      },
    },
  };
}

type DriverConstructor = (inputs: SensorInputs) => SensorHandle;

const HOST_DRIVERS: Record<string, DriverConstructor> = {
  vcgen: createCpuTemperature,
  system: createSystemMonitor,
  virtual_display: createVirtualDisplay,
  virtual_relay: createVirtualRelay,
};

export const HOST_SENSOR_TYPES = Object.keys(HOST_DRIVERS);

/**
 * Drivers that run on any Linux host without extra hardware
 */
export const hostDriverFactory: SensorDriverFactory = {
  create(sensorType: string, inputs: SensorInputs): SensorHandle {
    const driver = HOST_DRIVERS[sensorType];
    if (!driver) {
      throw new AgentError('DRIVER_UNAVAILABLE', `Unsupported sensor type: ${sensorType}`);
    }
    return driver(inputs);
  },
};
