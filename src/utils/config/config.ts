import path from 'path';

export type LogLevelName = 'DEBUG' | 'LOG' | 'WARN' | 'ERROR';

export type Config = {
  port: number;
  host: string;
  dataDir: string;
  reportDir: string;
  logFile: string | null;
  logLevel: LogLevelName;
};

// Repository root, two levels above src/utils/config (CommonJS)
const DEFAULT_DATA_DIR = path.join(__dirname, '../../../data');

const LOG_LEVELS: LogLevelName[] = ['DEBUG', 'LOG', 'WARN', 'ERROR'];

function parsePort(value: string | undefined): number {
  const port = Number(value);
  if (!value || !Number.isInteger(port) || port <= 0) {
    return 5002;
  }
  return port;
}

function parseLogLevel(value: string | undefined): LogLevelName {
  const upper = (value || '').toUpperCase();
  return LOG_LEVELS.find((level) => level === upper) ?? 'LOG';
}

/**
 * Reads the runtime configuration from the environment.
 *
 * Values are read on every call so that a changed `DATA_DIR` (tests point it
 * at a temporary directory) takes effect on the next file operation.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const dataDir = env.DATA_DIR ? path.resolve(env.DATA_DIR) : DEFAULT_DATA_DIR;
  return {
    port: parsePort(env.PORT),
    // Loopback unless HOST says otherwise; the API has no authentication
    host: env.HOST || '127.0.0.1',
    dataDir,
    reportDir: env.REPORT_DIR ? path.resolve(env.REPORT_DIR) : path.join(dataDir, 'reports'),
    logFile: env.LOG_FILE || null,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
