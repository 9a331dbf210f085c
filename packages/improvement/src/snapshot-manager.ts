import { createHash, randomUUID } from 'node:crypto';
import { access, mkdir, readdir, readFile, rm, rmdir, unlink, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve } from 'node:path';
import { createLogger, errorMessage, RollbackFailedError } from '@selfwright/core';
import type { CodeChange, Snapshot, SnapshotEntry, SnapshotIndexRecord } from '@selfwright/core';
import { dataDirWithinProject, protectedPathError, resolveProjectPath } from './improvement-validator.js';
import { SnapshotIndexRecordSchema, parseEach } from './schemas.js';
import { appendJsonLine, isMissingPathError, readJsonLines, writeFileAtomic } from './utils/file-io.js';
import { SerialQueue } from './utils/serial-queue.js';

const log = createLogger('SnapshotManager');

/**
 * Captures exact bytes of a set of paths before they are changed and
 * restores them on demand. Blobs are content-addressed (sha256) and the
 * snapshot history is an append-only JSONL index.
 *
 * `apply` is the only way the pipeline writes to monitored files.
 */
export class SnapshotManager {
  private readonly indexPath: string;
  private readonly blobDir: string;
  private readonly dataDirPath: string | null;
  private readonly queue = new SerialQueue();

  constructor(
    private readonly projectRoot: string,
    dataDir: string,
  ) {
    this.indexPath = join(dataDir, 'snapshots', 'index.jsonl');
    this.blobDir = join(dataDir, 'snapshots', 'blobs');
    this.dataDirPath = dataDirWithinProject(projectRoot, dataDir);
  }

  async createSnapshot(label: string, paths: string[]): Promise<string> {
    const id = `snap-${Date.now()}-${randomUUID().slice(0, 8)}`;
    const unique = [...new Set(paths.map((p) => this.toRelative(p)))];
    const entries: SnapshotEntry[] = [];

    for (const path of unique) {
      const absolute = this.toAbsolute(path);
      const bytes = await readIfPresent(absolute);
      if (bytes === null) {
        entries.push({ path, existed: false, missingParents: await this.missingParents(absolute) });
      } else {
        entries.push({ path, existed: true, blob: await this.storeBlob(bytes) });
      }
    }

    await this.appendRecord({ type: 'created', id, label, createdAt: new Date().toISOString(), entries });
    log.info(`Snapshot ${id} captured ${entries.length} path(s): ${label}`);
    return id;
  }

  /** Apply changes in order. Throws on the first failure, leaving earlier writes for rollback. */
  async apply(snapshotId: string, changes: CodeChange[]): Promise<number> {
    const snapshot = await this.require(snapshotId);
    const covered = new Set(snapshot.entries.map((e) => e.path));

    const targets = changes.map((change) => ({ change, path: this.toRelative(change.path) }));
    const blocked = targets.filter((t) => protectedPathError(t.path, this.dataDirPath) !== null);
    if (blocked.length > 0) {
      throw new Error(`Refusing to write protected path(s): ${blocked.map((t) => t.path).join(', ')}`);
    }
    const uncovered = targets.filter((t) => !covered.has(t.path));
    if (uncovered.length > 0) {
      throw new Error(
        `Refusing to apply changes outside snapshot ${snapshotId}: ${uncovered.map((t) => t.path).join(', ')}`,
      );
    }

    let applied = 0;
    for (const { change, path } of targets) {
      const absolute = this.toAbsolute(path);
      if (change.kind === 'delete') {
        await unlink(absolute);
      } else {
        await mkdir(dirname(absolute), { recursive: true });
        await writeFile(absolute, change.content, 'utf-8');
      }
      applied++;
      log.debug(`Applied ${change.kind} ${path}`);
    }
    return applied;
  }

  /**
   * Restore every entry of the snapshot verbatim. Safe to call repeatedly and
   * after a partial apply. Keeps going past individual failures, then throws
   * a RollbackFailedError listing them.
   */
  async rollbackTo(snapshotId: string): Promise<void> {
    const snapshot = await this.require(snapshotId);
    const failures: string[] = [];

    for (const entry of snapshot.entries) {
      try {
        await this.restoreEntry(entry);
      } catch (error) {
        failures.push(`${entry.path}: ${errorMessage(error)}`);
      }
    }

    if (failures.length > 0) {
      throw new RollbackFailedError(snapshotId, new Error(failures.join('; ')));
    }

    await this.appendRecord({ type: 'restored', id: snapshotId, at: new Date().toISOString() });
    log.info(`Rolled back to snapshot ${snapshotId}`);
  }

  /** Mark the snapshot as superseded by an accepted improvement */
  async commitImprovement(snapshotId: string, improvementId: string): Promise<void> {
    await this.require(snapshotId);
    await this.appendRecord({ type: 'superseded', id: snapshotId, improvementId, at: new Date().toISOString() });
  }

  async list(): Promise<Snapshot[]> {
    const records = await this.queue.run(() => this.readIndex());
    const snapshots = new Map<string, Snapshot>();

    for (const record of records) {
      switch (record.type) {
        case 'created':
          snapshots.set(record.id, {
            id: record.id,
            label: record.label,
            createdAt: record.createdAt,
            entries: record.entries,
            state: 'active',
          });
          break;
        case 'superseded': {
          const snapshot = snapshots.get(record.id);
          if (snapshot) {
            snapshot.state = 'superseded';
            snapshot.improvementId = record.improvementId;
          }
          break;
        }
        case 'restored': {
          const snapshot = snapshots.get(record.id);
          if (snapshot) snapshot.state = 'restored';
          break;
        }
        case 'pruned':
          snapshots.delete(record.id);
          break;
      }
    }
    return [...snapshots.values()];
  }

  async get(snapshotId: string): Promise<Snapshot | null> {
    return (await this.list()).find((s) => s.id === snapshotId) ?? null;
  }

  /**
   * Drop superseded and restored snapshots beyond the newest `keep`, then
   * delete blobs no remaining snapshot references. Active snapshots stay.
   */
  async prune(keep: number): Promise<number> {
    const snapshots = await this.list();
    const settled = snapshots
      .filter((s) => s.state !== 'active')
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
    const doomed = settled.slice(Math.max(0, keep));
    if (doomed.length === 0) return 0;

    const at = new Date().toISOString();
    for (const snapshot of doomed) {
      await this.appendRecord({ type: 'pruned', id: snapshot.id, at });
    }

    const doomedIds = new Set(doomed.map((s) => s.id));
    const referenced = new Set(
      snapshots
        .filter((s) => !doomedIds.has(s.id))
        .flatMap((s) => s.entries.map((e) => e.blob))
        .filter((blob): blob is string => blob !== undefined),
    );

    let blobs: string[] = [];
    try {
      blobs = await readdir(this.blobDir);
    } catch (error) {
      if (!isMissingPathError(error)) throw error;
    }
    for (const blob of blobs) {
      if (!referenced.has(blob)) await rm(join(this.blobDir, blob), { force: true });
    }

    log.info(`Pruned ${doomed.length} snapshot(s)`);
    return doomed.length;
  }

  private async restoreEntry(entry: SnapshotEntry): Promise<void> {
    const absolute = this.toAbsolute(entry.path);

    if (entry.existed) {
      if (!entry.blob) throw new Error('snapshot entry has no blob');
      const bytes = await readFile(join(this.blobDir, entry.blob));
      await mkdir(dirname(absolute), { recursive: true });
      await writeFile(absolute, bytes);
      return;
    }

    try {
      await unlink(absolute);
    } catch (error) {
      if (!isMissingPathError(error)) throw error;
    }
    for (const dir of entry.missingParents ?? []) {
      try {
        await rmdir(this.toAbsolute(dir));
      } catch (error) {
        // Directory gone or no longer empty: leave it
        if (!isMissingPathError(error) && !(error instanceof Error && 'code' in error && error.code === 'ENOTEMPTY')) {
          throw error;
        }
      }
    }
  }

  /** Ancestors of `absolute` (inside the project root) that do not exist yet, deepest first */
  private async missingParents(absolute: string): Promise<string[]> {
    const root = resolve(this.projectRoot);
    const missing: string[] = [];
    let dir = dirname(absolute);
    while (dir !== root && dir.startsWith(root)) {
      if (await exists(dir)) break;
      missing.push(this.toRelative(dir));
      dir = dirname(dir);
    }
    return missing;
  }

  private async storeBlob(bytes: Buffer): Promise<string> {
    const hash = createHash('sha256').update(bytes).digest('hex');
    const blobPath = join(this.blobDir, hash);
    if (!(await exists(blobPath))) {
      await writeFileAtomic(blobPath, bytes);
    }
    return hash;
  }

  private async require(snapshotId: string): Promise<Snapshot> {
    const snapshot = await this.get(snapshotId);
    if (!snapshot) throw new Error(`Snapshot not found: ${snapshotId}`);
    return snapshot;
  }

  private appendRecord(record: SnapshotIndexRecord): Promise<void> {
    return this.queue.run(() => appendJsonLine(this.indexPath, record));
  }

  private async readIndex(): Promise<SnapshotIndexRecord[]> {
    const { valid, invalid } = parseEach(await readJsonLines(this.indexPath), SnapshotIndexRecordSchema);
    if (invalid > 0) log.warn(`Ignored ${invalid} invalid snapshot index record(s)`);
    return valid;
  }

  private toRelative(path: string): string {
    const candidate = isAbsolute(path) ? relative(resolve(this.projectRoot), path) : path;
    const resolved = resolveProjectPath(this.projectRoot, candidate);
    if ('error' in resolved) throw new Error(`${path}: ${resolved.error}`);
    return resolved.path;
  }

  private toAbsolute(path: string): string {
    return resolve(this.projectRoot, path);
  }
}

async function readIfPresent(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path);
  } catch (error) {
    if (isMissingPathError(error)) return null;
    throw error;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
