/**
 * Atomic file writer
 *
 * Readers of the snapshot must never see a half-written file: contents go to
 * a uniquely named temp file in the destination directory, are flushed, and
 * replace the destination with a single rename.
 */

import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';
import { IoError, toError } from './errors.js';
import type { OutputPayloads } from './output-builder.js';
import type { SnapshotConfig } from './types/config.js';

export type StdoutWriter = (text: string) => void;

const defaultStdoutWriter: StdoutWriter = text => {
  process.stdout.write(text);
};

function tempPathFor(destination: string): string {
  const name = [
    '',
    path.basename(destination),
    process.pid,
    Date.now(),
    randomBytes(4).toString('hex'),
    'tmp',
  ].join('.');
  return path.join(path.dirname(destination), name);
}

async function stage<T>(message: string, target: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw new IoError(`${message} ${target}: ${toError(error).message}`, { path: target });
  }
}

/**
 * Write `contents` to `destination` atomically, creating parent directories
 */
export async function writeAtomic(destination: string, contents: string): Promise<void> {
  const directory = path.dirname(destination);
  await stage('failed to create output directory', directory, () => fs.mkdir(directory, { recursive: true }));

  const tempPath = tempPathFor(destination);
  const handle = await stage('failed to create temp file', tempPath, () => fs.open(tempPath, 'wx'));

  try {
    try {
      await stage('failed to write temp file', tempPath, () => handle.writeFile(contents, 'utf-8'));
      await stage('failed to flush temp file', tempPath, () => handle.sync());
    } finally {
      await stage('failed to flush temp file', tempPath, () => handle.close());
    }
    await stage('failed to move temp file', destination, () => fs.rename(tempPath, destination));
  } catch (error) {
    // Cleanup is best effort; the staged error is what gets reported
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw error;
  }
}

/**
 * Write built payloads where the configuration points
 *
 * With `stdout` only the primary payload is printed, followed by a newline.
 * Otherwise the primary payload is written before the outline. Returns the
 * paths written.
 */
export async function writeOutputs(
  config: SnapshotConfig,
  payloads: OutputPayloads,
  writeStdout: StdoutWriter = defaultStdoutWriter
): Promise<string[]> {
  if (config.stdout) {
    writeStdout(`${payloads.primary}\n`);
    return [];
  }

  if (!config.out) {
    throw new IoError('no output path configured');
  }

  const written: string[] = [];
  await writeAtomic(config.out, payloads.primary);
  written.push(config.out);

  if (config.outlineOut && payloads.outline !== undefined) {
    await writeAtomic(config.outlineOut, payloads.outline);
    written.push(config.outlineOut);
  }
  return written;
}
