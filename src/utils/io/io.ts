import {
  appendFileSync,
  copyFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  unlinkSync,
  writeFileSync,
} from 'fs';
import path from 'path';
import { getConfig } from '../config/config';

/**
 * Directory holding the backing files, resolved from `DATA_DIR` on every call
 */
export function getDataDir(): string {
  return getConfig().dataDir;
}

/**
 * Absolute path of a file in the data directory
 */
export function dataPath(fn: string): string {
  return path.join(getDataDir(), fn);
}

function ensureDataDir() {
  const dir = getDataDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Loads and parses JSON data from a file
 * @template T - The expected type of the loaded data
 * @param fn - Filename relative to the data directory
 * @returns Parsed data
 * @throws Error if file cannot be read or parsed
 */
export function load<T>(fn: string): T {
  const data = readFileSync(dataPath(fn), 'utf8');
  return JSON.parse(data);
}

/**
 * Reads a text file from the data directory
 */
export function loadText(fn: string): string {
  return readFileSync(dataPath(fn), 'utf8');
}

const SAVES_BEFORE_BACKUP = 10;
const MAX_BACKUPS = 10;
let saveCounter: Record<string, number> = {};

function backupDir() {
  return path.join(getDataDir(), 'backup');
}

/**
 * Creates a backup copy of a file with timestamp
 * Automatically manages backup rotation to keep only MAX_BACKUPS files
 * @param fn - Filename to backup
 */
export const backup = (fn: string) => {
  if (!checkExists(fn)) {
    return;
  }
  const dir = backupDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const backups = readdirSync(dir).filter((f) => f.startsWith(`${fn}.`));
  if (backups.length >= MAX_BACKUPS) {
    const oldest = backups.sort((a, b) => a.localeCompare(b))[0];
    unlinkSync(path.join(dir, oldest));
  }
  copyFileSync(dataPath(fn), path.join(dir, `${fn}.${Date.now()}`));
};

/**
 * Determines if a file should be backed up based on save counter
 * @param fn - Filename to check
 * @returns True on every SAVES_BEFORE_BACKUP-th call for the file
 */
export const shouldBackup = (fn: string) => {
  if (!saveCounter[fn]) {
    saveCounter[fn] = 0;
  }
  saveCounter[fn]++;
  if (saveCounter[fn] >= SAVES_BEFORE_BACKUP) {
    saveCounter[fn] = 0;
    return true;
  }
  return false;
};

export function resetSaveCounters() {
  saveCounter = {};
}

/**
 * Replaces a text file in the data directory, with backup rotation
 * @param content - Full file content
 * @param fn - Filename relative to data directory
 */
export function saveText(content: string, fn: string) {
  ensureDataDir();
  if (shouldBackup(fn)) {
    backup(fn);
  }
  writeFileSync(dataPath(fn), content, 'utf8');
}

/**
 * Appends text to a file in the data directory
 */
export function appendText(content: string, fn: string) {
  ensureDataDir();
  appendFileSync(dataPath(fn), content, 'utf8');
}

/**
 * Saves data to a JSON file with automatic backup rotation
 * @template T - Type of data being saved
 * @param data - Data object to save
 * @param fn - Filename relative to data directory
 */
export function save<T>(data: T, fn: string) {
  saveText(JSON.stringify(data, null, 2), fn);
}

/**
 * Checks if a file exists in the data directory
 * @param fn - Filename to check
 * @returns True if file exists, false otherwise
 */
export function checkExists(fn: string) {
  return existsSync(dataPath(fn));
}
