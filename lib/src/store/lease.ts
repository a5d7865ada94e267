/**
 * Single-writer lease
 *
 * The stores assume one active writer. Where overlapping executions
 * cannot be ruled out by the scheduler, a run holds this lease for its
 * whole duration. The lease file is written aside and hard-linked into
 * place, so it appears complete or not at all. An expired lease (its
 * holder was killed without releasing) is taken over: the file is renamed
 * to a private name, checked to still be the record judged expired, and
 * only then removed.
 */

import { randomUUID } from 'node:crypto';
import { link, mkdir, open, rename } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { isErrnoException } from '../ledger/ledger.js';
import { readJsonFile, removeFile } from './file-io.js';
import { StoreError, StoreErrorCode } from './types.js';

export const LeaseRecordSchema = z.object({
  owner: z.string(),
  acquired_at: z.string(),
  expires_at: z.string(),
});
export type LeaseRecord = z.infer<typeof LeaseRecordSchema>;

export interface FileLeaseOptions {
  /** Lease lifetime; should exceed the external time budget of a run */
  ttlMs: number;
  owner?: string;
  now?: () => Date;
}

export class FileLease {
  private readonly owner: string;
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private held: boolean = false;

  constructor(
    private readonly filePath: string,
    options: FileLeaseOptions
  ) {
    this.owner = options.owner ?? `${process.pid}-${randomUUID()}`;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  async acquire(): Promise<LeaseRecord> {
    await mkdir(dirname(this.filePath), { recursive: true });

    const record = await this.tryCreate();
    if (record) {
      return record;
    }

    const current = await this.readRecord(this.filePath);
    if (current && Date.parse(current.expires_at) > this.now().getTime()) {
      throw new StoreError(
        `Lease ${this.filePath} is held by ${current.owner} until ${current.expires_at}`,
        StoreErrorCode.LEASE_HELD,
        { filePath: this.filePath }
      );
    }

    // Expired, torn or vanished. Another contender may have replaced it
    // since the read, so check what was actually moved.
    const stalePath = `${this.filePath}.${randomUUID()}.stale`;
    if (await this.moveAside(stalePath)) {
      const moved = await this.readRecord(stalePath);
      if (!sameRecord(moved, current)) {
        await this.restore(stalePath);
        throw this.takenByAnother();
      }
      await removeFile(stalePath);
    }

    const takenOver = await this.tryCreate();
    if (!takenOver) {
      throw this.takenByAnother();
    }
    return takenOver;
  }

  /**
   * Remove the lease file if this owner still holds it
   */
  async release(): Promise<boolean> {
    if (!this.held) {
      return false;
    }
    this.held = false;

    const current = await this.readRecord(this.filePath);
    if (!current || current.owner !== this.owner) {
      return false;
    }
    return removeFile(this.filePath);
  }

  getOwner(): string {
    return this.owner;
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Lease record at `path`; a torn or invalid file counts as no lease
   */
  private async readRecord(path: string): Promise<LeaseRecord | null> {
    try {
      return await readJsonFile(path, LeaseRecordSchema);
    } catch (error) {
      if (error instanceof StoreError && error.code === StoreErrorCode.CORRUPT_DATA) {
        return null;
      }
      throw error;
    }
  }

  private async tryCreate(): Promise<LeaseRecord | null> {
    const acquiredAt = this.now();
    const record: LeaseRecord = {
      owner: this.owner,
      acquired_at: acquiredAt.toISOString(),
      expires_at: new Date(acquiredAt.getTime() + this.ttlMs).toISOString(),
    };
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;

    try {
      const handle = await open(tempPath, 'wx');
      try {
        await handle.writeFile(JSON.stringify(record, null, 2), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await link(tempPath, this.filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return null;
      }
      throw StoreError.fromError(error, StoreErrorCode.WRITE_FAILED, this.filePath);
    } finally {
      await removeFile(tempPath);
    }

    this.held = true;
    return record;
  }

  /**
   * Rename the lease file to `stalePath`; false if there was none to move
   */
  private async moveAside(stalePath: string): Promise<boolean> {
    try {
      await rename(this.filePath, stalePath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw StoreError.fromError(error, StoreErrorCode.WRITE_FAILED, this.filePath);
    }
  }

  /**
   * Put back a live lease that was moved aside by mistake. If a new lease
   * already took its place, that one stays.
   */
  private async restore(stalePath: string): Promise<void> {
    try {
      await link(stalePath, this.filePath);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw StoreError.fromError(error, StoreErrorCode.WRITE_FAILED, this.filePath);
      }
    }
    await removeFile(stalePath);
  }

  private takenByAnother(): StoreError {
    return new StoreError(
      `Lease ${this.filePath} was taken by another execution`,
      StoreErrorCode.LEASE_HELD,
      { filePath: this.filePath }
    );
  }
}

function sameRecord(a: LeaseRecord | null, b: LeaseRecord | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.owner === b.owner && a.acquired_at === b.acquired_at && a.expires_at === b.expires_at;
}

/**
 * Run `fn` while holding the lease; the lease is released on every exit path
 */
export async function withLease<T>(lease: FileLease, fn: () => Promise<T>): Promise<T> {
  await lease.acquire();
  try {
    return await fn();
  } finally {
    await lease.release();
  }
}
