import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { SyncAlreadyInProgressError } from "../core/errors.js";
import { logWarning, type EventLogger } from "../core/logger.js";
import { isErrnoCode, isoNow } from "../core/utils.js";

export const DEFAULT_LOCK_STALE_AFTER_MS = 10 * 60 * 1000;

const LockFileSchema = z.object({
  pid: z.number().int(),
  acquired_at: z.string(),
});

export type SyncLockOptions = {
  lockPath: string;
  logger: EventLogger;
  staleAfterMs?: number;
  now?: () => Date;
};

/**
 * Advisory lock file held for the duration of one sync. A second holder fails
 * fast; a lock older than `staleAfterMs` (or one that cannot be read) is taken over.
 */
export class SyncLock {
  private held = false;
  private readonly staleAfterMs: number;
  private readonly now: () => Date;

  constructor(private readonly options: SyncLockOptions) {
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_LOCK_STALE_AFTER_MS;
    this.now = options.now ?? (() => new Date());
  }

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    const { lockPath } = this.options;
    await fse.ensureDir(path.dirname(lockPath));

    if (await this.tryCreate()) {
      this.held = true;
      return;
    }

    const holder = await this.readHolder();
    const ageMs = holder ? this.now().getTime() - Date.parse(holder.acquired_at) : Number.NaN;
    const stale = !holder || Number.isNaN(ageMs) || ageMs > this.staleAfterMs;

    if (!stale) {
      throw new SyncAlreadyInProgressError(lockPath, holder?.pid);
    }

    logWarning(this.options.logger, "lock.stale_reclaimed", {
      lock_path: lockPath,
      holder_pid: holder?.pid ?? null,
      acquired_at: holder?.acquired_at ?? null,
    });
    await fse.remove(lockPath);

    if (!(await this.tryCreate())) {
      // Someone else reclaimed it between our remove and create.
      const current = await this.readHolder();
      throw new SyncAlreadyInProgressError(lockPath, current?.pid);
    }
    this.held = true;
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    await fse.remove(this.options.lockPath);
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  private async tryCreate(): Promise<boolean> {
    const body = JSON.stringify({ pid: process.pid, acquired_at: isoNow(this.now()) });
    try {
      await fse.writeFile(this.options.lockPath, `${body}\n`, { encoding: "utf8", flag: "wx" });
      return true;
    } catch (err) {
      if (isErrnoCode(err, "EEXIST")) {
        return false;
      }
      throw err;
    }
  }

  private async readHolder(): Promise<z.infer<typeof LockFileSchema> | null> {
    try {
      const raw: unknown = JSON.parse(await fse.readFile(this.options.lockPath, "utf8"));
      const parsed = LockFileSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    } catch (err) {
      if (err instanceof SyntaxError || isErrnoCode(err, "ENOENT")) {
        return null;
      }
      throw err;
    }
  }
}
