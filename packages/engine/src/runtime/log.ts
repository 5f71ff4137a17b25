/**
 * Console-compatible sink for lifecycle messages
 */
export type Logger = Pick<Console, "info" | "warn" | "error">;

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
