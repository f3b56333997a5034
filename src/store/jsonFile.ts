/**
 * Flat-file persistence shared by both stores.
 *
 * Writes go to a temp file in the same directory, are fsync'd, then renamed
 * over the target, so the target always holds either the previous or the new
 * complete content. A missing file reads as `found: false`; a file that exists
 * but is not JSON raises CorruptDataError.
 */
import fs from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';
import { CorruptDataError, IoFailureError } from '../errors.js';

/** The slice of `fs` the stores touch; tests swap in failing variants */
export interface FileSystem {
  readFileSync(file: string, encoding: 'utf-8'): string;
  mkdirSync(dir: string, options: { recursive: true }): unknown;
  openSync(file: string, flags: 'w'): number;
  writeSync(fd: number, data: string): number;
  fsyncSync(fd: number): void;
  closeSync(fd: number): void;
  renameSync(from: string, to: string): void;
  unlinkSync(file: string): void;
}

export type ReadResult = { found: false } | { found: true; data: unknown };

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function tempPathFor(filePath: string): string {
  const suffix = `${process.pid}.${randomBytes(4).toString('hex')}`;
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${suffix}.tmp`);
}

function discardTemp(tmp: string, fsImpl: FileSystem): void {
  try {
    fsImpl.unlinkSync(tmp);
  } catch (error) {
    if (!isNotFound(error)) {
      console.warn(`[store] Could not remove temp file ${tmp}:`, error);
    }
  }
}

/**
 * Replace `filePath` with `contents` atomically.
 * Throws IoFailureError; the temp file never outlives a failed write.
 */
export function writeFileAtomic(filePath: string, contents: string, fsImpl: FileSystem = fs): void {
  const tmp = tempPathFor(filePath);
  try {
    fsImpl.mkdirSync(path.dirname(filePath), { recursive: true });
    const fd = fsImpl.openSync(tmp, 'w');
    try {
      fsImpl.writeSync(fd, contents);
      fsImpl.fsyncSync(fd);
    } finally {
      fsImpl.closeSync(fd);
    }
    fsImpl.renameSync(tmp, filePath);
  } catch (error) {
    discardTemp(tmp, fsImpl);
    throw new IoFailureError(filePath, 'write', error);
  }
}

export class JsonFile {
  constructor(
    readonly filePath: string,
    private readonly fsImpl: FileSystem = fs,
  ) {}

  read(): ReadResult {
    let text: string;
    try {
      text = this.fsImpl.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return { found: false };
      throw new IoFailureError(this.filePath, 'read', error);
    }

    try {
      const data: unknown = JSON.parse(text);
      return { found: true, data };
    } catch (error) {
      throw new CorruptDataError(this.filePath, 'not valid JSON', { cause: error });
    }
  }

  write(data: unknown): void {
    writeFileAtomic(this.filePath, `${JSON.stringify(data, null, 2)}\n`, this.fsImpl);
  }

  /**
   * Move the current file aside as `<name>.corrupt-<timestamp>` and return the new path.
   * Returns null when there was nothing to move.
   */
  quarantine(now: Date = new Date()): string | null {
    const target = `${this.filePath}.corrupt-${now.toISOString().replace(/[:.]/g, '-')}`;
    try {
      this.fsImpl.renameSync(this.filePath, target);
      return target;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new IoFailureError(this.filePath, 'quarantine', error);
    }
  }
}
