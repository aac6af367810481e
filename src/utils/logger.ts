export type Logger = Pick<Console, "log" | "warn" | "error">;

export const consoleLogger: Logger = console;

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
