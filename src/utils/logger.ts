/**
 * Logger utility using Pino
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

let transport: pino.DestinationStream | undefined;
if (process.stdout.isTTY && !process.env.VITEST) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } catch {
    // pino-pretty not available, use default
    transport = undefined;
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level });

export type Logger = pino.Logger;

const children: Logger[] = [];

export function createLogger(name: string): Logger {
  const child = rootLogger.child({ name });
  children.push(child);
  return child;
}

/** Children copy the level when created, so they are updated too. */
export function setLogLevel(next: pino.LevelWithSilent): void {
  rootLogger.level = next;
  for (const child of children) {
    child.level = next;
  }
}

export { rootLogger as logger };
