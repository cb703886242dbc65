export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function isSilenced(): boolean {
  return process.env.NODE_ENV === 'test' && process.env.TEST_LOGGING !== 'true';
}

// stdout is reserved for tool output, so every level goes to stderr
function writeLog(level: LogLevel, scope: string, event: string, fields: LogFields = {}): void {
  if (isSilenced() || LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }
  const payload = {
    timestamp: new Date().toISOString(),
    level,
    scope,
    event,
    ...fields,
  };
  process.stderr.write(`${JSON.stringify(payload)}\n`);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (event, fields) => writeLog('debug', scope, event, fields),
    info: (event, fields) => writeLog('info', scope, event, fields),
    warn: (event, fields) => writeLog('warn', scope, event, fields),
    error: (event, fields) => writeLog('error', scope, event, fields),
  };
}
