/**
 * Structured logger built on pino
 *
 * JSON lines with ISO timestamps and level labels.
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { loadConfig } from '../config/config.js';
import type { ScratchConfig } from '../config/config.js';

export type { Logger };

export function createLogger(
  config: ScratchConfig = loadConfig(),
  destination?: DestinationStream
): Logger {
  const options = {
    name: config.logName,
    level: config.logLevel,
    formatters: { level: (label: string) => ({ level: label }) },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination !== undefined ? pino(options, destination) : pino(options);
}

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}

export function createModuleLogger(module: string, parent?: Logger): Logger {
  return (parent ?? getRootLogger()).child({ module });
}
