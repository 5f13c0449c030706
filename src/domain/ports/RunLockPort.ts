export interface RunLockHandle {
  release(): Promise<void>;
}

/** 互斥的執行鎖；已被其他執行持有時 acquire() 回傳 undefined */
export interface RunLockPort {
  acquire(): Promise<RunLockHandle | undefined>;
}
