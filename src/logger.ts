export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

const PREFIX = "[seo]";

export const consoleLogger: Logger = {
  debug: (...args: unknown[]) => console.debug(PREFIX, ...args),
  info: (...args: unknown[]) => console.log(PREFIX, ...args),
  warn: (...args: unknown[]) => console.warn(PREFIX, ...args),
  error: (...args: unknown[]) => console.error(PREFIX, ...args),
};

const noop = () => undefined;

export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };
