import pino from 'pino';

const logger: pino.Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

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

/**
 * Route console.* through pino so third-party console output is structured
 * JSON too. Only the CLI entry point installs this.
 */
export function installConsoleRedirect(target: pino.Logger = logger): void {
  console.log = (...args: unknown[]) => target.info(formatArgs(args));
  console.error = (...args: unknown[]) => target.error(formatArgs(args));
  console.warn = (...args: unknown[]) => target.warn(formatArgs(args));
  console.info = (...args: unknown[]) => target.info(formatArgs(args));
  console.debug = (...args: unknown[]) => target.debug(formatArgs(args));
}

export default logger;
