import pino, { type Logger } from 'pino';
import { getConfig } from './config/index.js';

/** Jest sets JEST_WORKER_ID in every worker */
export function isTestEnv(): boolean {
  return !!process.env.JEST_WORKER_ID || process.env.NODE_ENV === 'test';
}

export function createLogger(): Logger {
  const { logLevel, logPretty } = getConfig();
  if (isTestEnv()) {
    return pino({ level: 'silent' });
  }

  const options = {
    base: undefined,
    level: logLevel,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.epochTime,
  };

  if (logPretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
        colorize: false,
        ignore: 'pid,hostname',
        destination: 2,
      },
    });
    return pino(options, transport);
  }
  return pino(options, pino.destination(2));
}

let root: Logger | null = null;

export function getLogger(): Logger {
  if (!root) root = createLogger();
  return root;
}

export function withScope(scope: string): Logger {
  return getLogger().child({ scope });
}

// For testing: the next getLogger call rebuilds from the current config
export function resetLogger(): void {
  root = null;
}
