import pino from 'pino';
import { config } from './config.js';

let target: NodeJS.WritableStream = process.stdout;

// Resolved per line so a command that writes its results to stdout can move logs aside
const destination: pino.DestinationStream = {
  write: (line: string) => {
    target.write(line);
  },
};

/**
 * Sends every later log line to stderr
 */
export const routeLogsToStderr = (): void => {
  target = process.stderr;
};

export const logger = pino(
  {
    level: config.logLevel,
    base: { service: 'hmpi-engine' },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  destination,
);
