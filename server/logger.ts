import pino from 'pino';
import { bindingsKey, formatArgs, splitLogTag, type LogBindings } from './lib/logFormat.js';

const logger: pino.Logger = pino({
  name: 'market-snapshot-collector',
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

const children = new Map<string, pino.Logger>();

/** Child logger bound to a module, and optionally to the domain or source it is working on. */
export function childLogger(bindings: LogBindings): pino.Logger {
  const key = bindingsKey(bindings);
  let child = children.get(key);
  if (!child) {
    child = logger.child(bindings);
    children.set(key, child);
  }
  return child;
}

type Level = 'info' | 'error' | 'warn' | 'debug';

function emit(level: Level, args: unknown[]): void {
  const { bindings, message } = splitLogTag(formatArgs(args));
  const target = bindings ? childLogger(bindings) : logger;
  target[level](message);
}

// Modules log through console.* with a "[module]" or "[module:source]" prefix;
// importing this module routes those calls to the matching child logger.
console.log = (...args: unknown[]) => emit('info', args);
console.error = (...args: unknown[]) => emit('error', args);
console.warn = (...args: unknown[]) => emit('warn', args);
console.info = (...args: unknown[]) => emit('info', args);
console.debug = (...args: unknown[]) => emit('debug', args);

export default logger;
