import type { ExtractionResult } from './Extraction.js';

/** 由文件信封抽出的呈現用 metadata */
export interface MeetingMetadata {
  documentId: string;
  title: string;
  /** YYYY-MM-DD（依設定時區） */
  date: string;
  /** HH:mm（24 小時制） */
  time: string;
  /** 例：Tuesday, March 04, 2025 at 02:30 PM */
  displayDate: string;
  createdAt: string;
  attendees: string[];
  /** 筆記建立者的顯示名稱 */
  owner?: string;
  durationMinutes?: number;
  calendarEventId?: string;
  meetingLink?: string;
  recordingUrl?: string;
  summary?: string;
}

export interface EnrichmentInfo {
  extraction: ExtractionResult;
  model: string;
}

/** 要寫入 vault 的會議筆記；enrichment 缺省時為 basic note */
export interface MeetingNote {
  metadata: MeetingMetadata;
  /** 轉換後的原始筆記內容 */
  markdown: string;
  enrichment?: EnrichmentInfo;
}
