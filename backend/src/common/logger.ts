/**
 * Logger contract
 *
 * Same call shape as the Fastify (pino) logger, so `app.log` can be
 * injected directly. Standalone services fall back to console.
 */

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export function createConsoleLogger(prefix: string): Logger {
  const line = (obj: object, msg?: string) => (msg ? `[${prefix}] ${msg}` : `[${prefix}]`);
  return {
    info: (obj, msg) => console.log(line(obj, msg), obj),
    warn: (obj, msg) => console.warn(line(obj, msg), obj),
    error: (obj, msg) => console.error(line(obj, msg), obj),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
