import { describe, expect, it } from 'vitest';
import { openDb } from './db.js';

describe('openDb', () => {
  it('migrates a fresh in-memory database', () => {
    const db = openDb(':memory:');
    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all()
      .map(r => r.name);

    expect(tables).toEqual(['_migrations', 'generations', 'runs']);
    expect(db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM _migrations').get()?.n).toBe(2);
    db.close();
  });
});
