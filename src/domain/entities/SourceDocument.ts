import type { ContentNode } from './ContentNode.js';

export interface PersonRef {
  name?: string;
  email?: string;
}

/** 從筆記服務抓下來的會議文件；抓取後不再變動 */
export interface SourceDocument {
  /** 外部唯一 id，也是 vault 中的去重 key */
  readonly id: string;
  readonly title: string | null;
  /** ISO-8601 建立時間 */
  readonly createdAt: string;
  readonly updatedAt?: string;
  /** 服務端標記為非會議（例如空白筆記）時為 false */
  readonly validMeeting: boolean;
  readonly creator?: PersonRef;
  readonly attendees: readonly PersonRef[];
  /** 行事曆事件的與會者，僅在 attendees 為空時作為備援 */
  readonly calendarAttendees: readonly PersonRef[];
  readonly calendarEventId?: string;
  readonly meetingLink?: string;
  readonly recordingUrl?: string;
  readonly durationMinutes?: number;
  readonly summary?: string;
  readonly content?: ContentNode;
}
