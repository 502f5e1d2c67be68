/**
 * Sink for evaluation traces.
 * Shaped like a pino logger, so `app.log` or any child of it fits.
 */
export interface HandLogger {
  debug(obj: Record<string, unknown>, msg: string): void;
}

export const silentLogger: HandLogger = {
  debug() {},
};
