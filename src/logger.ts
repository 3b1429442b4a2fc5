import type { Logger } from './types.js';

/**
 * Console-style logger that keeps stdout clean: everything goes to stderr
 * with a level prefix. `debug` lines are only written when verbose.
 */
export function createConsoleLogger(opts: { verbose?: boolean } = {}): Logger {
  const write = (level: string, args: unknown[]) => {
    process.stderr.write(`[${level}] ` + args.map(format).join(' ') + '\n');
  };
  return {
    info: (...args) => write('INFO', args),
    warn: (...args) => write('WARN', args),
    error: (...args) => write('ERROR', args),
    debug: (...args) => {
      if (opts.verbose) write('DEBUG', args);
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

function format(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === 'string') return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}
