import { pino, type Logger, destination, multistream, type DestinationStream, type Level, type LevelWithSilent } from 'pino';
import * as path from 'path';

export type UtilLogLevel = LevelWithSilent;

const LOG_LEVELS: readonly UtilLogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLevel(value: string | undefined): UtilLogLevel {
  const level = LOG_LEVELS.find(l => l === value);
  return level ?? 'info';
}

const logLevel = resolveLevel(process.env['LOG_LEVEL']);

// Unset means stderr only
const logFile = process.env['LANWATCH_LOG_FILE'];

let fileLoggingActive = false;
let fileLoggingError: string | undefined;

// stderr keeps stdout free for command output. Streams accept everything;
// the logger level does the filtering.
const streams: Array<{ level: Level; stream: DestinationStream }> = [
  { level: 'trace', stream: process.stderr },
];

if (logFile !== undefined && logFile !== '') {
  try {
    const fileStream = destination({
      dest: path.resolve(logFile),
      sync: false,
      mkdir: true,
    });
    streams.push({ level: 'trace', stream: fileStream });
    fileLoggingActive = true;
  } catch (err) {
    fileLoggingActive = false;
    fileLoggingError = err instanceof Error ? err.message : String(err);
  }
}

export const logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  multistream(streams)
);

logger.debug({
  event: 'module_loaded',
  logFile: fileLoggingActive ? logFile : 'stderr only',
  nodeVersion: process.version,
  pid: process.pid,
}, 'lanwatch logger ready');

if (fileLoggingError !== undefined) {
  logger.warn({ logFile, error: fileLoggingError }, 'Log file unavailable, logging to stderr only');
}

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}

export function isFileLoggingActive(): boolean {
  return fileLoggingActive;
}
