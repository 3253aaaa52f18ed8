export type SensorInputs = Record<string, unknown>;

export type SensorData = Record<string, unknown>;

export interface SensorConfig {
  sensor_id: string;          // Unique per device, stable across restarts
  sensor_type: string;        // Selects the hardware driver, e.g. "dht11", "vcgen"
  inputs: SensorInputs;       // Interpreted by the driver, e.g. { pin_no: 14 }
  enabled: boolean;
  alias?: string;             // Human-readable name
}

export interface SensorConfigFile {
  sensors: SensorConfig[];
}

export type ReadingStatus = 'success' | 'error';

export interface SensorReading {
  sensor_id: string;
  sensor_type: string;
  data: SensorData;
  timestamp: number;          // Unix seconds
  status: ReadingStatus;
  error?: string;
}

// --- Driver boundary: capabilities are optional members, not subclasses ---

export interface DisplayCapability {
  displayText(text: string, clear: boolean): void | Promise<void>;
  appendText(text: string): void | Promise<void>;
  clear(): void | Promise<void>;
}

export interface OutputCapability {
  toggle(): void | Promise<void>;
  setValue(value: boolean): void | Promise<void>;
}

export interface SensorHandle {
  read(): SensorData | Promise<SensorData>;
  display?: DisplayCapability;
  output?: OutputCapability;
  close?(): void | Promise<void>;
}

export interface SensorDriverFactory {
  /** Throws when the sensor type is unknown or the hardware cannot be opened. */
  create(sensorType: string, inputs: SensorInputs): SensorHandle | Promise<SensorHandle>;
}

export type SensorAction =
  | { kind: 'display_text'; text: string; clear: boolean }
  | { kind: 'append_text'; text: string }
  | { kind: 'clear' }
  | { kind: 'toggle' }
  | { kind: 'set_output'; value: boolean };

export type ConfigSaveHook = (configs: SensorConfig[]) => void | Promise<void>;

// --- Result shapes returned to the platform ---

export interface ActionResult {
  status: ReadingStatus;
  action?: string;
  params?: Record<string, unknown>;
  error?: string;
  timestamp: number;
}

export interface SensorStatus {
  sensor_id: string;
  sensor_type: string;
  enabled: boolean;
  alias: string | null;
  inputs: SensorInputs;
  initialized: boolean;
  timestamp: number;
}

export interface SensorStatusError {
  status: 'error';
  error: string;
  timestamp: number;
}

export interface AllSensorsStatus {
  total_sensors: number;
  sensors: SensorStatus[];
  timestamp: number;
}

export interface ConfigureResult {
  status: ReadingStatus;
  sensor_id?: string;
  config?: SensorConfig;
  error?: string;
  timestamp: number;
}

export interface SensorCommand {
  action?: string;
  sensor_id?: string;
  params?: Record<string, unknown>;
  config?: Record<string, unknown>;
}

export type SensorCommandResult =
  | { command: 'read'; sensor_id: string; result: SensorReading; timestamp: number }
  | { command: 'read_all'; result: SensorReading[]; count: number; timestamp: number }
  | { command: 'execute'; sensor_id: string; execute_action: string; result: ActionResult; timestamp: number }
  | { command: 'status'; sensor_id: string | null; result: SensorStatus | SensorStatusError | AllSensorsStatus; timestamp: number }
  | { command: 'configure'; sensor_id: string; result: ConfigureResult; timestamp: number }
  | { command: string; status: 'error'; error: string; timestamp: number };
