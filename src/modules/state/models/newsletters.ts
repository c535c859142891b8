import type Database from 'better-sqlite3';

export interface NewsletterRecord {
  id: number;
  week_of: string;
  title: string;
  markdown_content: string;
  meeting_ids: string;
  publish_id: string | null;
  publish_url: string | null;
  created_at: string;
}

export interface UpsertNewsletterInput {
  weekOf: string;
  title: string;
  markdown: string;
  meetingIds?: number[];
  publishId?: string;
  publishUrl?: string;
}

export function createNewsletterModel(db: Database.Database) {
  return {
    /**
     * One digest per week; regenerating a week replaces its content.
     */
    upsert(input: UpsertNewsletterInput): number {
      const row = db.prepare(`
        INSERT INTO newsletters (week_of, title, markdown_content, meeting_ids, publish_id, publish_url)
        VALUES (@week_of, @title, @markdown_content, @meeting_ids, @publish_id, @publish_url)
        ON CONFLICT(week_of) DO UPDATE SET
          title = excluded.title,
          markdown_content = excluded.markdown_content,
          meeting_ids = excluded.meeting_ids,
          publish_id = COALESCE(excluded.publish_id, newsletters.publish_id),
          publish_url = COALESCE(excluded.publish_url, newsletters.publish_url)
        RETURNING id
      `).get({
        week_of: input.weekOf,
        title: input.title,
        markdown_content: input.markdown,
        meeting_ids: JSON.stringify(input.meetingIds ?? []),
        publish_id: input.publishId ?? null,
        publish_url: input.publishUrl ?? null,
      }) as { id: number };
      return row.id;
    },

    getByWeek(weekOf: string): NewsletterRecord | undefined {
      return db.prepare('SELECT * FROM newsletters WHERE week_of = ?').get(weekOf) as NewsletterRecord | undefined;
    },

    getLatest(): NewsletterRecord | undefined {
      return db.prepare('SELECT * FROM newsletters ORDER BY week_of DESC LIMIT 1').get() as NewsletterRecord | undefined;
    },
  };
}
