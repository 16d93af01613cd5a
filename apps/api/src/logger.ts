import { config, type LogLevel } from './config';

type LogContext = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: value.name,
      message: value.message
    };
    if ('code' in value && value.code !== undefined) {
      serialized.code = value.code;
    }
    if (value.cause !== undefined) {
      serialized.cause = serializeValue(value.cause);
    }
    if (config.env !== 'production') {
      serialized.stack = value.stack;
    }
    return serialized;
  }
  return value;
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext) {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[config.logLevel]) {
    return;
  }

  const entry: Record<string, unknown> = {
    time: new Date().toISOString(),
    level,
    message
  };

  if (context) {
    for (const [key, value] of Object.entries(context)) {
      entry[key] = serializeValue(value);
    }
  }

  const line = JSON.stringify(entry);
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function logDebug(message: string, context?: LogContext) {
  write('debug', message, context);
}

export function logInfo(message: string, context?: LogContext) {
  write('info', message, context);
}

export function logWarn(message: string, context?: LogContext) {
  write('warn', message, context);
}

export function logError(message: string, context?: LogContext) {
  write('error', message, context);
}
