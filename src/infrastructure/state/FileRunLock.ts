import crypto from 'node:crypto';
import fs, { type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import type { RunLockHandle, RunLockPort } from '../../domain/ports/RunLockPort.js';
import { Logger } from '../../shared/Logger.js';

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/** 以 signal 0 探測 pid；EPERM 表示行程存在但屬於其他使用者 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return isErrnoCode(err, 'EPERM');
  }
}

interface LockHolder {
  raw: string;
  pid?: number;
  acquiredAt: number;
  token?: string;
}

/**
 * 以 O_EXCL 建立的檔案鎖
 *
 * 內容為持有者的 pid、取得時間（ISO）與隨機 token。
 * 持有者 pid 已不存在時視為殘留；無法取得 pid 時才以 staleMs 判斷。
 * release() 只刪除仍帶有自己 token 的鎖檔。
 */
export class FileRunLock implements RunLockPort {
  private readonly logger = new Logger('FileRunLock');

  constructor(
    private readonly lockPath: string,
    private readonly staleMs: number,
    private readonly now: () => number = Date.now,
    private readonly isAlive: (pid: number) => boolean = isProcessAlive,
  ) {}

  async acquire(): Promise<RunLockHandle | undefined> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    const token = crypto.randomUUID();
    if (await this.tryCreate(token)) return this.handle(token);

    const holder = await this.readHolder();
    if (holder && !this.isStale(holder)) {
      this.logger.info('Lock is held by another run', { lockPath: this.lockPath, pid: holder.pid });
      return undefined;
    }

    if (holder) {
      this.logger.warn('Taking over stale lock', { lockPath: this.lockPath, pid: holder.pid });
      if (!(await this.evict(holder, token))) return undefined;
    }
    return (await this.tryCreate(token)) ? this.handle(token) : undefined;
  }

  private async tryCreate(token: string): Promise<boolean> {
    let file: FileHandle;
    try {
      file = await fs.open(this.lockPath, 'wx');
    } catch (err) {
      if (isErrnoCode(err, 'EEXIST')) return false;
      throw err;
    }
    try {
      await file.writeFile(`${process.pid}\n${new Date(this.now()).toISOString()}\n${token}\n`, 'utf-8');
    } finally {
      await file.close();
    }
    return true;
  }

  /** 讀取鎖檔內容；鎖檔已消失時回傳 undefined */
  private async readHolder(): Promise<LockHolder | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.lockPath, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return undefined;
      throw err;
    }
    const [pidLine, stamp, token] = raw.split('\n');
    const pid = Number.parseInt(pidLine ?? '', 10);
    let acquiredAt = Date.parse(stamp ?? '');
    if (Number.isNaN(acquiredAt)) {
      try {
        acquiredAt = (await fs.stat(this.lockPath)).mtimeMs;
      } catch (err) {
        if (isErrnoCode(err, 'ENOENT')) return undefined;
        throw err;
      }
    }
    return {
      raw,
      pid: Number.isInteger(pid) && pid > 0 ? pid : undefined,
      acquiredAt,
      token: token || undefined,
    };
  }

  private isStale(holder: LockHolder): boolean {
    if (holder.pid !== undefined) return !this.isAlive(holder.pid);
    return this.now() - holder.acquiredAt > this.staleMs;
  }

  /**
   * 把殘留鎖檔改名移開；rename 只會有一個競爭者成功。
   * 移走的內容不是先前讀到的殘留鎖時（其他執行已搶先接管），放回原位並放棄。
   */
  private async evict(holder: LockHolder, token: string): Promise<boolean> {
    const evicted = `${this.lockPath}.${token}.stale`;
    try {
      await fs.rename(this.lockPath, evicted);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return false;
      throw err;
    }

    const moved = await fs.readFile(evicted, 'utf-8');
    if (moved !== holder.raw) {
      try {
        await fs.link(evicted, this.lockPath);
      } catch (err) {
        if (!isErrnoCode(err, 'EEXIST')) throw err;
      } finally {
        await fs.rm(evicted, { force: true });
      }
      return false;
    }
    await fs.rm(evicted, { force: true });
    return true;
  }

  private handle(token: string): RunLockHandle {
    let released = false;
    return {
      release: async () => {
        if (released) return;
        released = true;
        const holder = await this.readHolder();
        if (holder?.token !== token) {
          this.logger.warn('Lock was taken over by another run; leaving it in place', {
            lockPath: this.lockPath, pid: holder?.pid,
          });
          return;
        }
        await fs.rm(this.lockPath, { force: true });
      },
    };
  }
}
