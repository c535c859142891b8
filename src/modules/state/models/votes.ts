import type Database from 'better-sqlite3';
import { parseNameList } from '../db.js';
import type { VoteRecord } from '../../extraction/records.js';

export interface VoteRow {
  id: number;
  meeting_id: number;
  motion: string;
  result: string;
  unanimous: number;
  yes_names: string;
  no_names: string;
  abstain_names: string;
  context: string;
  created_at: string;
}

export interface DissentingVote {
  motion: string;
  no: string[];
  abstain: string[];
  meetingDate: string;
  body: string;
}

export function createVoteModel(db: Database.Database) {
  const remove = db.prepare('DELETE FROM votes WHERE meeting_id = ?');
  const insert = db.prepare(`
    INSERT INTO votes (meeting_id, motion, result, unanimous, yes_names, no_names, abstain_names, context)
    VALUES (@meeting_id, @motion, @result, @unanimous, @yes_names, @no_names, @abstain_names, @context)
  `);

  const replace = db.transaction((meetingId: number, votes: readonly VoteRecord[]) => {
    remove.run(meetingId);
    for (const v of votes) {
      insert.run({
        meeting_id: meetingId,
        motion: v.motion,
        result: v.result,
        unanimous: v.unanimous ? 1 : 0,
        yes_names: JSON.stringify(v.yes),
        no_names: JSON.stringify(v.no),
        abstain_names: JSON.stringify(v.abstain),
        context: v.context,
      });
    }
    return votes.length;
  });

  return {
    /**
     * Delete the meeting's votes and insert `votes` in one transaction.
     */
    replaceForMeeting(meetingId: number, votes: readonly VoteRecord[]): number {
      return replace(meetingId, votes);
    },

    getForMeeting(meetingId: number): VoteRow[] {
      return db.prepare('SELECT * FROM votes WHERE meeting_id = ? ORDER BY id').all(meetingId) as VoteRow[];
    },

    /**
     * Split votes from meetings on or after `sinceDate` (YYYY-MM-DD), newest first.
     */
    getDissentingSince(sinceDate: string, limit = 100): DissentingVote[] {
      const rows = db.prepare(`
        SELECT v.motion, v.no_names, v.abstain_names, m.meeting_date, m.body
        FROM votes v JOIN meetings m ON m.id = v.meeting_id
        WHERE v.unanimous = 0 AND m.meeting_date >= ?
        ORDER BY m.meeting_date DESC, v.id DESC
        LIMIT ?
      `).all(sinceDate, limit) as Array<{
        motion: string;
        no_names: string;
        abstain_names: string;
        meeting_date: string;
        body: string;
      }>;

      return rows.map(r => ({
        motion: r.motion,
        no: parseNameList(r.no_names),
        abstain: parseNameList(r.abstain_names),
        meetingDate: r.meeting_date,
        body: r.body,
      }));
    },
  };
}
