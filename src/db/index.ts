import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { config } from '../config';
import * as schema from './schema';

export type Db = BetterSQLite3Database<typeof schema>;

/**
 * A store handle: either the database itself or a transaction opened on it.
 * Repository functions accept this so callers decide the commit boundary.
 */
export type Store = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

const initSql = `
    CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL UNIQUE,
        email TEXT NOT NULL UNIQUE,
        passwordHash TEXT NOT NULL,
        createdAt INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS capsules (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        message TEXT NOT NULL,
        unlockAt INTEGER NOT NULL,
        createdAt INTEGER NOT NULL,
        unlockCode TEXT NOT NULL UNIQUE,
        expired INTEGER NOT NULL DEFAULT 0,
        userId INTEGER NOT NULL REFERENCES users(id)
    );
    CREATE INDEX IF NOT EXISTS idx_capsules_userId ON capsules(userId);
    CREATE INDEX IF NOT EXISTS idx_capsules_expired ON capsules(expired);
`;

export interface DbHandle {
    db: Db;
    close(): void;
}

/**
 * Opens a database and makes sure the schema exists.
 *
 * Every call returns a fresh handle; the server owns its handle and closes it
 * on shutdown, tests open one per app with `:memory:`.
 */
export function createDb(dbPath: string = config.dbPath): DbHandle {
    if (dbPath !== ':memory:') {
        mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const sqlite = new Database(dbPath);

    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');
    sqlite.exec(initSql);

    return {
        db: drizzle(sqlite, { schema }),
        close: () => sqlite.close(),
    };
}
