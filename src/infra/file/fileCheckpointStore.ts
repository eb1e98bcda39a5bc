import { link, open, readFile, rename, rm, writeFile } from "fs/promises";
import { CheckpointLockedError, CorruptCheckpointError } from "../../common/errors";
import { errorCode } from "../../common/errorCode";
import { CheckpointStore } from "../../modules/checkpoints/repository";

const OFFSET_PATTERN = /^\d+$/;

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(error) === "EPERM";
  }
}

/**
 * Line-offset checkpoint kept as a single text file.
 *
 * Writes go to `<path>.tmp` and are renamed over the checkpoint once synced,
 * so a crash leaves either the previous offset or the new one on disk.
 * A `<path>.lock` file holding the owner's pid keeps two runs from sharing
 * the same checkpoint; a lock left behind by a dead process is taken over.
 * Lock files are only ever created by `link` and moved by `rename`.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly tempPath: string;
  private readonly lockPath: string;
  private holdsLock = false;

  constructor(private readonly path: string) {
    this.tempPath = `${path}.tmp`;
    this.lockPath = `${path}.lock`;
  }

  async load(): Promise<number> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return 0;
      }
      throw error;
    }

    const trimmed = content.trim();
    if (trimmed === "") {
      return 0;
    }
    if (!OFFSET_PATTERN.test(trimmed)) {
      throw new CorruptCheckpointError(this.path, trimmed);
    }
    const offset = Number(trimmed);
    if (!Number.isSafeInteger(offset)) {
      throw new CorruptCheckpointError(this.path, trimmed);
    }
    return offset;
  }

  async save(offset: number): Promise<void> {
    if (!Number.isSafeInteger(offset) || offset < 0) {
      throw new RangeError(`Checkpoint offset must be a non-negative integer, got ${offset}`);
    }

    const handle = await open(this.tempPath, "w");
    try {
      await handle.writeFile(String(offset), "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(this.tempPath, this.path);
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
    await rm(this.tempPath, { force: true });
  }

  async acquire(): Promise<void> {
    if (await this.tryCreateLock()) {
      return;
    }

    const holderPid = await this.readLockHolder(this.lockPath);
    if (holderPid !== undefined && isProcessAlive(holderPid)) {
      throw new CheckpointLockedError(this.lockPath, holderPid);
    }

    if (!(await this.takeOverStaleLock(holderPid))) {
      throw new CheckpointLockedError(this.lockPath);
    }
  }

  async release(): Promise<void> {
    if (!this.holdsLock) {
      return;
    }
    await rm(this.lockPath, { force: true });
    this.holdsLock = false;
  }

  /**
   * Moves the stale lock aside with an atomic rename and checks that what was
   * moved is still the dead holder's. If another run replaced it in between,
   * its lock is linked back and the takeover gives up.
   */
  protected async takeOverStaleLock(stalePid: number | undefined): Promise<boolean> {
    const claimPath = `${this.lockPath}.${process.pid}`;
    try {
      await rename(this.lockPath, claimPath);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return this.tryCreateLock();
      }
      throw error;
    }

    if ((await this.readLockHolder(claimPath)) !== stalePid) {
      try {
        await link(claimPath, this.lockPath);
      } catch (error) {
        if (errorCode(error) !== "EEXIST") {
          throw error;
        }
      }
      await rm(claimPath, { force: true });
      return false;
    }

    await rm(claimPath, { force: true });
    return this.tryCreateLock();
  }

  // The pid is written before the lock appears, so a lock is never seen empty
  private async tryCreateLock(): Promise<boolean> {
    const pendingPath = `${this.lockPath}.${process.pid}.new`;
    await writeFile(pendingPath, String(process.pid), "utf-8");
    try {
      await link(pendingPath, this.lockPath);
      this.holdsLock = true;
      return true;
    } catch (error) {
      if (errorCode(error) === "EEXIST") {
        return false;
      }
      throw error;
    } finally {
      await rm(pendingPath, { force: true });
    }
  }

  private async readLockHolder(path: string): Promise<number | undefined> {
    try {
      const pid = Number((await readFile(path, "utf-8")).trim());
      return Number.isSafeInteger(pid) && pid > 0 ? pid : undefined;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }
}
