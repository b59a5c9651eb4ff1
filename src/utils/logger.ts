import { pino, type Logger } from 'pino';

const LOG_LEVEL = process.env.CONTENT_MEMORY_LOG_LEVEL || 'warn';

const rootLogger = pino({ name: 'content-memory', level: LOG_LEVEL });

/** Child logger tagged with the component that writes through it */
export function createLogger(component: string, parent: Logger = rootLogger): Logger {
  return parent.child({ component });
}

export type { Logger };
