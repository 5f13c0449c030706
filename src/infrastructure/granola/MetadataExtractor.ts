import type { SourceDocument, PersonRef } from '../../domain/entities/SourceDocument.js';
import type { MeetingMetadata } from '../../domain/entities/MeetingNote.js';
import { toPersonDisplayName } from '../../domain/value-objects/PersonName.js';

export const UNTITLED_MEETING = 'Untitled Meeting';

interface LocalParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
}

function personName(p: PersonRef): string | undefined {
  const raw = p.name?.trim() || p.email?.trim();
  if (!raw) return undefined;
  const name = toPersonDisplayName(raw);
  return name || undefined;
}

/** 依時區取出日期時間各欄位 */
function localParts(date: Date, timeZone: string): LocalParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return {
    year: pick('year'),
    month: pick('month'),
    day: pick('day'),
    hour: pick('hour'),
    minute: pick('minute'),
  };
}

/** 例：Tuesday, March 04, 2025 at 02:30 PM */
function displayDate(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'long',
    month: 'long',
    day: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h12',
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${pick('weekday')}, ${pick('month')} ${pick('day')}, ${pick('year')} at ${pick('hour')}:${pick('minute')} ${pick('dayPeriod').toUpperCase()}`;
}

/**
 * 從 SourceDocument 信封抽出筆記 metadata
 *
 * 與會者順序：建立者 → attendees（空時改用行事曆與會者），依顯示名稱去重。
 */
export class MetadataExtractor {
  extract(doc: SourceDocument, timeZone: string): MeetingMetadata {
    const created = new Date(doc.createdAt);
    const local = localParts(created, timeZone);

    const owner = doc.creator ? personName(doc.creator) : undefined;
    const invited = doc.attendees.length > 0 ? doc.attendees : doc.calendarAttendees;

    const attendees: string[] = [];
    const seen = new Set<string>();
    for (const name of [owner, ...invited.map(personName)]) {
      if (!name) continue;
      const key = name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      attendees.push(name);
    }

    const duration = doc.durationMinutes !== undefined && doc.durationMinutes > 0
      ? Math.round(doc.durationMinutes)
      : undefined;

    return {
      documentId: doc.id,
      title: doc.title?.trim() || UNTITLED_MEETING,
      date: `${local.year}-${local.month}-${local.day}`,
      time: `${local.hour}:${local.minute}`,
      displayDate: displayDate(created, timeZone),
      createdAt: doc.createdAt,
      attendees,
      owner,
      durationMinutes: duration,
      calendarEventId: doc.calendarEventId,
      meetingLink: doc.meetingLink,
      recordingUrl: doc.recordingUrl,
      summary: doc.summary?.trim() || undefined,
    };
  }
}
