// logger.ts - Logging seam for pipeline components
//
// Components prefix their messages with a bracketed subsystem tag
// ("[resolver]", "[fallback]", "[batch]"). Retried transient failures go to
// warn; progress chatter goes to info.

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};
