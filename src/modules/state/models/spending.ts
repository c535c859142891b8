import type Database from 'better-sqlite3';
import type { SpendingRecord } from '../../extraction/records.js';

export interface SpendingRow {
  vendor: string;
  amount: number;
  description: string;
  category: string;
  project: string | null;
  budget_line: string | null;
  fiscal_year: number | null;
  contract_term: string | null;
  meeting_date: string;
  body: string;
}

export function createSpendingModel(db: Database.Database) {
  const remove = db.prepare('DELETE FROM spending_items WHERE meeting_id = ?');
  const insert = db.prepare(`
    INSERT INTO spending_items
      (meeting_id, vendor, amount, description, category, project, budget_line, fiscal_year, contract_term)
    VALUES
      (@meeting_id, @vendor, @amount, @description, @category, @project, @budget_line, @fiscal_year, @contract_term)
  `);

  const replace = db.transaction((meetingId: number, items: readonly SpendingRecord[], fiscalYear: number) => {
    remove.run(meetingId);
    for (const s of items) {
      insert.run({
        meeting_id: meetingId,
        vendor: s.vendor,
        amount: s.amount,
        description: s.description,
        category: s.category,
        project: s.project,
        budget_line: s.budgetLine,
        fiscal_year: fiscalYear,
        contract_term: s.contractTerm,
      });
    }
    return items.length;
  });

  const selectJoined = `
    SELECT s.vendor, s.amount, s.description, s.category, s.project, s.budget_line,
           s.fiscal_year, s.contract_term, m.meeting_date, m.body
    FROM spending_items s JOIN meetings m ON m.id = s.meeting_id
  `;

  return {
    /**
     * Delete the meeting's spending items and insert `items` in one transaction.
     */
    replaceForMeeting(meetingId: number, items: readonly SpendingRecord[], fiscalYear: number): number {
      return replace(meetingId, items, fiscalYear);
    },

    /**
     * Items from meetings on or after `sinceDate` (YYYY-MM-DD), largest first.
     */
    getSince(sinceDate: string): SpendingRow[] {
      return db.prepare(
        `${selectJoined} WHERE m.meeting_date >= ? ORDER BY s.amount DESC, s.id`
      ).all(sinceDate) as SpendingRow[];
    },
  };
}
