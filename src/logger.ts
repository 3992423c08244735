import pc from "picocolors";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Unprefixed line, used for banners and summary rows. */
  plain(message: string): void;
}

export const logger: Logger = {
  info: (message) => console.log(`${pc.blue("[INFO]")} ${message}`),
  success: (message) => console.log(`${pc.green("[SUCCESS]")} ${message}`),
  warn: (message) => console.log(`${pc.yellow("[WARN]")} ${message}`),
  error: (message) => console.error(`${pc.red("[ERROR]")} ${message}`),
  plain: (message) => console.log(message),
};

export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  plain: () => {},
};
