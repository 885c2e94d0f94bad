import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

let loggerInstance: pino.Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// 環境変数LOG_LEVELからデフォルトのレベルを決定
function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function createLogger(level: LogLevel = defaultLevel()): pino.Logger {
  if (loggerInstance) {
    // 既に作成済みの場合はレベルのみ更新
    loggerInstance.level = level;
    return loggerInstance;
  }

  // silentの場合はpino-prettyのワーカーを起動しない
  if (level === 'silent') {
    loggerInstance = pino({ level });
    return loggerInstance;
  }

  loggerInstance = pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  });
  return loggerInstance;
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    return createLogger();
  }
  return loggerInstance;
}

export type Logger = pino.Logger;
