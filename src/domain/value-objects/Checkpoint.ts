/**
 * 同步進度標記：最後一份完成處理的文件（建立時間 + id）
 *
 * 不可變；advance() 只會前進，傳入較舊的位置時回傳自己，
 * 因此 checkpoint 永遠不會倒退。
 */
export class Checkpoint {
  private constructor(
    public readonly createdAt: string,
    public readonly documentId?: string,
  ) {}

  static at(createdAt: string, documentId?: string): Checkpoint {
    if (Number.isNaN(Date.parse(createdAt))) {
      throw new Error(`Invalid checkpoint timestamp: ${createdAt}`);
    }
    return new Checkpoint(createdAt, documentId);
  }

  get timeMs(): number {
    return Date.parse(this.createdAt);
  }

  /** 依 (時間, id) 排序比較；負數代表 this 較早 */
  compareTo(other: Checkpoint): number {
    const diff = this.timeMs - other.timeMs;
    if (diff !== 0) return diff;
    return (this.documentId ?? '').localeCompare(other.documentId ?? '');
  }

  advance(createdAt: string, documentId: string): Checkpoint {
    const candidate = Checkpoint.at(createdAt, documentId);
    return candidate.compareTo(this) > 0 ? candidate : this;
  }

  equals(other: Checkpoint): boolean {
    return this.compareTo(other) === 0;
  }

  toJSON(): { createdAt: string; documentId?: string } {
    return { createdAt: this.createdAt, documentId: this.documentId };
  }
}
