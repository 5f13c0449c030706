import path from 'node:path';
import type { VaultPort } from '../domain/ports/VaultPort.js';
import type { MeetingNote, MeetingMetadata } from '../domain/entities/MeetingNote.js';
import { WriteIOError } from '../domain/errors/DomainErrors.js';
import type { MarkdownParser } from '../infrastructure/vault/MarkdownParser.js';
import type { MeetingNoteRenderer } from '../infrastructure/vault/MeetingNoteRenderer.js';
import { UNTITLED_MEETING } from '../infrastructure/granola/MetadataExtractor.js';
import { Logger, errorFields } from '../shared/Logger.js';

export const ID_FIELD = 'granola_id';
const MAX_TITLE_LENGTH = 100;

export interface WriteOutcome {
  status: 'written' | 'skipped';
  path: string;
}

/** 移除檔名不允許的字元、壓縮空白、截斷長度 */
export function sanitizeTitle(title: string): string {
  const cleaned = title
    .replace(/[<>:"/\\|?*!]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_TITLE_LENGTH)
    .trim();
  return cleaned || UNTITLED_MEETING;
}

/** 候選檔名：`<date> - <title>.md`，被占用時依序加上 id 前 8 碼、完整 id */
export function candidateFileNames(meta: MeetingMetadata): string[] {
  const base = `${meta.date} - ${sanitizeTitle(meta.title)}`;
  const shortId = meta.documentId.slice(0, 8);
  const names = [`${base}.md`, `${base} (${shortId}).md`];
  if (shortId !== meta.documentId) names.push(`${base} (${meta.documentId}).md`);
  return names;
}

/**
 * 會議筆記寫入
 *
 * 以 frontmatter 的 granola_id 為去重 key：第一次寫入前掃描整個 vault（略過隱藏目錄）建立索引，
 * 筆記被移出 notesDir 仍然算數；之後同一個 NoteWriter 內寫入的筆記也會加入索引。
 * vault 中已有同 id 的筆記時不動磁碟。
 */
export class NoteWriter {
  private index?: Map<string, string>;
  private readonly logger = new Logger('NoteWriter');

  constructor(
    private readonly vault: VaultPort,
    private readonly renderer: MeetingNoteRenderer,
    private readonly parser: MarkdownParser,
    private readonly vaultRoot: string,
    private readonly notesDir: string,
  ) {}

  /** 已存在的筆記路徑 */
  async findExisting(documentId: string): Promise<string | undefined> {
    const index = await this.loadIndex();
    return index.get(documentId);
  }

  async writeBasic(note: MeetingNote): Promise<WriteOutcome> {
    const id = note.metadata.documentId;
    const existing = await this.findExisting(id);
    if (existing) {
      this.logger.debug('Note already in vault', { documentId: id, path: existing });
      return { status: 'skipped', path: existing };
    }

    const target = await this.chooseTarget(note.metadata);
    await this.vault.ensureDirectory(this.notesDir);
    await this.vault.writeFileAtomic(target, this.renderer.render(note));
    this.index?.set(id, target);

    this.logger.info('Wrote note', { documentId: id, path: target });
    return { status: 'written', path: target };
  }

  /** 以 enriched 版本原子覆寫 basic note */
  async writeEnriched(notePath: string, note: MeetingNote): Promise<void> {
    await this.vault.writeFileAtomic(notePath, this.renderer.render(note));
    this.logger.info('Wrote enriched note', { documentId: note.metadata.documentId, path: notePath });
  }

  private async chooseTarget(meta: MeetingMetadata): Promise<string> {
    for (const name of candidateFileNames(meta)) {
      const candidate = path.join(this.notesDir, name);
      if (!(await this.vault.fileExists(candidate))) return candidate;
    }
    throw new WriteIOError(
      `No free file name for document ${meta.documentId}`,
      path.join(this.notesDir, candidateFileNames(meta)[0]),
      { documentId: meta.documentId },
    );
  }

  private async loadIndex(): Promise<Map<string, string>> {
    if (this.index) return this.index;

    const index = new Map<string, string>();
    const files = await this.vault.listMarkdownFiles(this.vaultRoot);
    for (const file of files) {
      let id: string | undefined;
      try {
        id = this.parser.stringField(await this.vault.readFile(file), ID_FIELD);
      } catch (err) {
        this.logger.warn('Cannot read frontmatter; file excluded from dedup index', {
          path: file, ...errorFields(err),
        });
        continue;
      }
      if (id && !index.has(id)) index.set(id, file);
    }

    this.logger.debug('Dedup index built', { vaultRoot: this.vaultRoot, notes: index.size });
    this.index = index;
    return index;
  }
}
