/**
 * Node implementations of the core interfaces.
 */

import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import type { FileSystem, Logger } from "./interfaces";

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => readFileSync(path, "utf-8"),
    readFileBinary: (path) => readFileSync(path),
    exists: (path) => existsSync(path),
    readdir: (path) => readdirSync(path),
    stat(path) {
      const stats = statSync(path);
      return { isDirectory: stats.isDirectory(), isFile: stats.isFile(), size: stats.size };
    },
  };
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

/**
 * Logger writing to stderr. Debug lines and traces only appear when verbose.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { verbose = false } = options;
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  return {
    debug(message) {
      if (verbose) write(message);
    },
    info(message) {
      write(message);
    },
    warn(message) {
      write(`Warning: ${message}`);
    },
    trace(error) {
      if (!verbose) return;
      if (error instanceof Error) {
        write(error.stack ?? `${error.name}: ${error.message}`);
      } else {
        write(String(error));
      }
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  trace: () => {},
};
