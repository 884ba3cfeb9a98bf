/**
 * Logger seam for the core. The CLI plugs in a console logger; library
 * callers get silence unless they pass one.
 */

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
  error() {},
};
