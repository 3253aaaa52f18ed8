import * as winston from "winston";
import * as path from "node:path";
import * as fs from "node:fs";
import Config from "../core/config/index";

// --- Custom levels: `notify` sits between warn and info ---
const customLogLevels = {
  levels: {
    error: 0,
    warn: 1,
    notify: 2,
    info: 3,
    http: 4,
    verbose: 5,
    debug: 6,
    silly: 7,
  },
  colors: {
    error: "red",
    warn: "yellow",
    notify: "blue",
    info: "green",
    http: "magenta",
    verbose: "cyan",
    debug: "white",
    silly: "grey",
  },
};

interface AgentLogger extends winston.Logger {
  notify: winston.LeveledLogMethod;
}

winston.addColors(customLogLevels.colors);

const logsDir = Config.LOG_DIR;
const archiveDir = path.join(logsDir, "archive");
const logFiles = ["error.log", "combined.log"];

// Rotate the previous run's logs into archive/ on start
function archiveOldLogs() {
  fs.mkdirSync(archiveDir, { recursive: true });

  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");

  for (const logFile of logFiles) {
    const logPath = path.join(logsDir, logFile);
    if (fs.existsSync(logPath) && fs.statSync(logPath).size > 0) {
      try {
        fs.copyFileSync(logPath, path.join(archiveDir, `${timestamp}_${logFile}`));
        fs.truncateSync(logPath, 0);
      } catch (err) {
        console.error(`Failed to archive ${logFile}:`, err);
      }
    }
  }
}

function toSourcePath(jsPath: string): string {
  if (jsPath.endsWith(".ts")) {return jsPath;}
  return jsPath.replace(/\/dist\//, "/src/").replace(/\.js$/, ".ts");
}

function getCallerInfo() {
  const originalStackTraceLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = 20;
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, getCallerInfo);
  const stackLines = holder.stack?.split("\n").slice(1) || [];
  Error.stackTraceLimit = originalStackTraceLimit;

  for (const line of stackLines) {
    const match = line.match(/\(([^:]+):(\d+):\d+\)/) || line.match(/at\s+([^:]+):(\d+):\d+/);
    if (match) {
      const [, file, lineNumber] = match;
      if (
        file.includes("node_modules/") ||
        file.includes("internal/") ||
        file.includes("node:") ||
        file.includes("/utils/logger")
      ) {
        continue;
      }
      return {
        file: toSourcePath(file),
        line: Number.parseInt(lineNumber, 10),
      };
    }
  }
  return { file: "unknown", line: 0 };
}

const fileAndLine = winston.format((info) => {
  const stackInfo = getCallerInfo();
  if (stackInfo.file !== "unknown") {
    const relativePath = path.relative(process.cwd(), stackInfo.file);
    info.logpath = `${relativePath}:${stackInfo.line}`;
  } else {
    info.logpath = "unknown:0";
  }
  return info;
});

const transportsList: winston.transport[] = [];

if (Config.LOG_TO_FILE) {
  archiveOldLogs();
  transportsList.push(
    new winston.transports.File({ filename: path.join(logsDir, "error.log"), level: "error" }),
    new winston.transports.File({ filename: path.join(logsDir, "combined.log") }),
  );
}

transportsList.push(
  new winston.transports.Console({
    silent: Config.LOG_SILENT,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf((info) => `${String(info.timestamp)} [${String(info.logpath)}] ${info.level}: ${String(info.message)}`),
    ),
  }),
);

export const logger = winston.createLogger({
  level: Config.LOG_LEVEL,
  levels: customLogLevels.levels,
  format: winston.format.combine(
    fileAndLine(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: transportsList,
}) as AgentLogger;
