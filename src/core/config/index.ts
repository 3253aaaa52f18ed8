import dotenv from 'dotenv';
import * as os from 'node:os';
import * as path from 'node:path';

dotenv.config();

const isTest = process.env.NODE_ENV === 'test';

const AGENT_HOME = process.env.AGENT_CONFIG_DIR || path.join(os.homedir(), '.iot-device');

const Config = {
  AGENT_HOME,
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_DIR: process.env.LOG_DIR || path.join(AGENT_HOME, 'logs'),
  LOG_TO_FILE: process.env.LOG_TO_FILE ? process.env.LOG_TO_FILE === 'true' : !isTest,
  LOG_SILENT: isTest && !process.env.LOG_LEVEL,
};

export default Config;
