import type Database from 'better-sqlite3';
import type { DocumentKind } from '../../documents/types.js';

export interface UpsertMeetingInput {
  meetingDate: string;
  body: string;
  sourceFilename: string;
  sourceType?: DocumentKind;
  videoUrl?: string | null;
  extractText?: string | null;
}

export function createMeetingModel(db: Database.Database) {
  const upsert = db.prepare(`
    INSERT INTO meetings (meeting_date, body, source_filename, source_type, video_url, extract_text)
    VALUES (@meeting_date, @body, @source_filename, @source_type, @video_url, @extract_text)
    ON CONFLICT(meeting_date, body) DO UPDATE SET
      source_filename = excluded.source_filename,
      source_type = excluded.source_type,
      video_url = COALESCE(excluded.video_url, meetings.video_url),
      extract_text = COALESCE(excluded.extract_text, meetings.extract_text)
    RETURNING id
  `);
  const selectId = db.prepare('SELECT id FROM meetings WHERE meeting_date = ? AND body = ?');

  return {
    /**
     * One row per (date, body); re-running a meeting updates it in place.
     */
    upsert(input: UpsertMeetingInput): number {
      const row = upsert.get({
        meeting_date: input.meetingDate,
        body: input.body,
        source_filename: input.sourceFilename,
        source_type: input.sourceType ?? 'transcript',
        video_url: input.videoUrl ?? null,
        extract_text: input.extractText ?? null,
      }) as { id: number };
      return row.id;
    },

    findId(meetingDate: string, body: string): number | null {
      const row = selectId.get(meetingDate, body) as { id: number } | undefined;
      return row?.id ?? null;
    },
  };
}
