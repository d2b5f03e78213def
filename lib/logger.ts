'use strict';

export interface Logger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createConsoleLogger(component: string): Logger {
  const prefix = () => `${new Date().toISOString()} [${component}]`;

  return {
    log: (...args: unknown[]) => console.log(prefix(), ...args),
    error: (...args: unknown[]) => console.error(prefix(), ...args),
  };
}

export const silentLogger: Logger = {
  log: () => undefined,
  error: () => undefined,
};
