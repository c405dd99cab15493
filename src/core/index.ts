export * from "./interfaces";
export { createNodeFileSystem, createConsoleLogger, silentLogger, type ConsoleLoggerOptions } from "./node";
