import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

interface Migration {
  name: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    name: '001_wallets.sql',
    sql: `
CREATE TABLE IF NOT EXISTS wallets (
  blockchain TEXT NOT NULL,
  address TEXT NOT NULL,
  owner TEXT,
  owner_type TEXT NOT NULL,
  first_seen INTEGER NOT NULL,
  last_seen INTEGER NOT NULL,
  PRIMARY KEY (blockchain, address)
);
CREATE INDEX IF NOT EXISTS idx_wallets_owner ON wallets(owner_type, owner);
`,
  },
];

/**
 * Open (or create) the address book database.
 * Runs pragmas and applies pending migrations.
 */
export function openAddressBook(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');

  runMigrations(db);

  return db;
}

function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `);

  const applied = new Set(
    db
      .prepare('SELECT name FROM _migrations')
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string'),
  );

  const record = db.prepare('INSERT INTO _migrations (name, applied_at) VALUES (?, ?)');

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.name)) continue;

    db.transaction(() => {
      db.exec(migration.sql);
      record.run(migration.name, Math.floor(Date.now() / 1000));
    })();
  }
}
