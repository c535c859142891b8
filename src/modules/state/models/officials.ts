import type Database from 'better-sqlite3';

export interface OfficialRecord {
  id: number;
  name: string;
  body: string;
  role: string;
  first_seen: string;
}

export function createOfficialModel(db: Database.Database) {
  return {
    /**
     * Officials are unique per (name, body); an existing row is left untouched.
     */
    upsert(name: string, body: string): number {
      const row = db.prepare(`
        INSERT INTO officials (name, body) VALUES (?, ?)
        ON CONFLICT(name, body) DO UPDATE SET name = excluded.name
        RETURNING id
      `).get(name, body) as { id: number };
      return row.id;
    },

    list(body?: string): OfficialRecord[] {
      if (body) {
        return db.prepare('SELECT * FROM officials WHERE body = ? ORDER BY name').all(body) as OfficialRecord[];
      }
      return db.prepare('SELECT * FROM officials ORDER BY body, name').all() as OfficialRecord[];
    },
  };
}
