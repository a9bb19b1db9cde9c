import { createSubLogger } from './logger.js';
import path from 'path';
import fs from 'fs';

const log = createSubLogger('fileLogger');

/**
 * Opens a log file for a child process to write into, truncating anything a
 * previous run left behind. The parent directory is created when missing.
 * @returns The file descriptor; the caller closes it once handed off
 */
export function openTruncatedLog(filePath: string): number {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    log.info(`Created log directory at ${dir}`);
  }

  const fd = fs.openSync(filePath, 'w');
  log.debug(`Opened log file: ${filePath}`, { fd });
  return fd;
}

export function closeLog(fd: number): void {
  fs.closeSync(fd);
}
