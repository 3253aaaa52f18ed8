import * as os from 'node:os';
import * as path from 'node:path';

process.env.NODE_ENV = 'test';
process.env.AGENT_CONFIG_DIR = path.join(os.tmpdir(), `iot-device-test-${process.pid}`);
process.env.LOG_TO_FILE = 'false';
