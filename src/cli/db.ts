import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { getMigrations } from '../main/migrations';
import { createAppServices, type AppServices, type AppServicesOptions } from '../main/providers/setup';
import { CONFIG_DIR_NAME } from '../main/services/config-service';

const DEFAULT_DB_PATH = path.join(os.homedir(), CONFIG_DIR_NAME, 'release-pr.db');

export function resolveDbPath(flagPath?: string): string {
  if (flagPath) return flagPath;
  if (process.env.RELEASE_PR_DB_PATH) return process.env.RELEASE_PR_DB_PATH;
  return DEFAULT_DB_PATH;
}

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied = new Set(
    (db.prepare('SELECT name FROM migrations').all() as { name: string }[]).map((row) => row.name),
  );

  for (const migration of getMigrations()) {
    if (!applied.has(migration.name)) {
      const transaction = db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO migrations (name) VALUES (?)').run(migration.name);
      });
      transaction();
    }
  }
}

export function openDatabase(
  flagPath?: string,
  options?: AppServicesOptions,
): { db: Database.Database; services: AppServices } {
  const dbPath = resolveDbPath(flagPath);

  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');

  runMigrations(db);

  const services = createAppServices(db, options);
  return { db, services };
}
