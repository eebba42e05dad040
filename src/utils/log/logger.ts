import fs from 'fs';
import path from 'path';
import { getConfig } from '../config/config';

export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.LOG, LogLevel.WARN, LogLevel.ERROR];

type ExtraInformation = Record<string, unknown>;

const unwritableLogFiles = new Set<string>();

/**
 * Appends a message to the configured log file
 *
 * Does nothing when `LOG_FILE` is not set, or once writing to it has failed.
 *
 * @param message - The message to log to the file
 * @param reset - If true, overwrites the file; if false, appends to the file
 */
export function logToFile(message: string, reset: boolean = false) {
  const { logFile } = getConfig();
  if (!logFile || unwritableLogFiles.has(logFile)) {
    return;
  }
  const stream = fs.createWriteStream(logFile, { flags: reset ? 'w' : 'a' });
  stream.on('error', (error) => {
    // Later lines go to the console only
    if (!unwritableLogFiles.has(logFile)) {
      unwritableLogFiles.add(logFile);
      console.error(`Cannot write log file ${logFile}: ${error.message}`);
    }
  });
  stream.write(message + '\n');
  stream.end();
}

/**
 * Extracts caller information from the call stack
 * @param depth How deep in the call stack to look (2 = caller of caller)
 */
function getCallerInfo(depth: number = 2): { fileName: string; functionName: string } {
  const originalPrepareStackTrace = Error.prepareStackTrace;

  try {
    Error.prepareStackTrace = (_, stack) => stack;
    const stack = new Error().stack as unknown as NodeJS.CallSite[];

    if (stack && stack.length > depth) {
      const caller = stack[depth];
      const fileName = caller.getFileName();
      const functionName = caller.getFunctionName();

      return {
        fileName: fileName ? path.basename(fileName, path.extname(fileName)) : 'unknown',
        functionName: functionName || 'anonymous',
      };
    }
  } finally {
    Error.prepareStackTrace = originalPrepareStackTrace;
  }

  return {
    fileName: 'unknown',
    functionName: 'unknown',
  };
}

function isExtraInformation(value: unknown): value is ExtraInformation {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' | ');
}

function isEnabled(level: LogLevel): boolean {
  const threshold = getConfig().logLevel;
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.findIndex((l) => l === threshold);
}

/**
 * Builds the log line: `LEVEL | file:function | message | key: value`
 */
export function formatLogLine(
  level: LogLevel,
  caller: { fileName: string; functionName: string },
  args: unknown[],
): string {
  let extraInformation: ExtraInformation | undefined;
  let messageParts = args;

  // A trailing plain object is extra information rather than part of the message
  const last = args[args.length - 1];
  if (args.length > 1 && isExtraInformation(last)) {
    extraInformation = last;
    messageParts = args.slice(0, -1);
  }

  const message = messageParts.map((part) => (typeof part === 'string' ? part : JSON.stringify(part))).join(' ');

  const parts = [level, `${caller.fileName}:${caller.functionName}`, message];
  if (extraInformation) {
    parts.push(formatExtraInformation(extraInformation));
  }
  return parts.join(' | ');
}

function logMessage(level: LogLevel, ...args: unknown[]): void {
  if (!isEnabled(level)) {
    return;
  }
  const fullOutput = formatLogLine(level, getCallerInfo(3), args);

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(fullOutput);
      break;
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
    default:
      console.log(fullOutput);
  }
  logToFile(fullOutput);
}

/**
 * Debug level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Unparseable date', { date: 'soon' })
 */
export function debug(...args: unknown[]): void {
  logMessage(LogLevel.DEBUG, ...args);
}

/**
 * Info level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Added expense', { category: 'Food' })
 */
export function log(...args: unknown[]): void {
  logMessage(LogLevel.LOG, ...args);
}

/**
 * Warning level logging
 */
export function warn(...args: unknown[]): void {
  logMessage(LogLevel.WARN, ...args);
}

/**
 * Error level logging
 */
export function err(...args: unknown[]): void {
  logMessage(LogLevel.ERROR, ...args);
}

/**
 * Generic logging function that accepts a level and multiple message parts like console.log
 */
export function logger(level: LogLevel, ...args: unknown[]): void {
  logMessage(level, ...args);
}
