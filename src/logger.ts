/**
 * graphbuf — logging
 *
 * One pino root logger per process, named 'graphbuf'. Modules take a child
 * with a `component` binding. Callers that already run pino can pass their
 * own logger through BuilderOptions / ReaderOptions instead.
 */

import { pino, type Logger } from 'pino';
import { defaultLogLevel } from './config';

export type { Logger };

let rootLogger: Logger | undefined;

export function getRootLogger(): Logger {
  if (rootLogger === undefined) {
    rootLogger = pino({ name: 'graphbuf', level: defaultLogLevel() });
  }
  return rootLogger;
}

export function childLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getRootLogger()).child({ component });
}
