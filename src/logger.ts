import { pino, destination, type Logger } from "pino";
import { loadConfig } from "./config.js";

export type { Logger };

// stderr, so stdout carries only the CLI's own summary lines
export const logDestination = destination(2);

export const logger: Logger = pino({ level: loadConfig().logLevel }, logDestination);
