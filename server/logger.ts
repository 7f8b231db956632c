import pino from 'pino';

// Test runs stay quiet unless LOG_LEVEL is set explicitly.
const defaultLevel = process.env.NODE_TEST_CONTEXT ? 'silent' : 'info';

const logger: pino.Logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// Redirect console methods to pino so stray console.log/error/warn calls
// still produce structured JSON output.
function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

console.log = (...args: unknown[]) => logger.info(formatArgs(args));
console.error = (...args: unknown[]) => logger.error(formatArgs(args));
console.warn = (...args: unknown[]) => logger.warn(formatArgs(args));
console.info = (...args: unknown[]) => logger.info(formatArgs(args));
console.debug = (...args: unknown[]) => logger.debug(formatArgs(args));

/** Child logger tagged with the owning module, e.g. `moduleLogger('fetch-scheduler')`. */
export function moduleLogger(module: string): pino.Logger {
  return logger.child({ module });
}

export default logger;
