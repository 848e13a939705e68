import { IAppserviceStorageProvider } from 'matrix-bot-sdk';
import SqliteDB from 'better-sqlite3';
import * as hash from 'hash.js';

import { IPushTokenInput, IPushTokenRecord, IPushTokenStore } from './push';
import { getLogger } from './log';

const log = getLogger('database');

export interface IBridgeDatabase extends IPushTokenStore, IAppserviceStorageProvider {}

function column(row: object, key: string): unknown {
  return Object.getOwnPropertyDescriptor(row, key)?.value;
}

function textColumn(row: object, key: string): string | null {
  const v = column(row, key);
  return typeof v === 'string' && v ? v : null;
}

function toPushTokenRecord(row: unknown): IPushTokenRecord | null {
  if (typeof row !== 'object' || row === null) {
    return null;
  }
  const selector = textColumn(row, 'selector');
  if (!selector) {
    return null;
  }
  return {
    selector,
    tokenMsgs: textColumn(row, 'token_msgs'),
    appIdMsgs: textColumn(row, 'appid_msgs'),
    tokenCalls: textColumn(row, 'token_calls'),
    appIdCalls: textColumn(row, 'appid_calls'),
    createdAt: new Date(textColumn(row, 'created_at') || 0),
    updatedAt: new Date(textColumn(row, 'updated_at') || 0),
  };
}

/**
 * SQLite storage for device push tokens and the application service's own
 * bookkeeping.
 */
export class SqliteBridgeDatabase implements IBridgeDatabase {
  protected db: SqliteDB.Database;

  protected txns = new Set<string>();
  protected readonly now: () => Date;

  protected stmt_savetoken: SqliteDB.Statement;
  protected stmt_gettoken_sel: SqliteDB.Statement;
  protected stmt_gettoken_key: SqliteDB.Statement;
  protected stmt_listtokens: SqliteDB.Statement;
  protected stmt_deltoken: SqliteDB.Statement;
  protected stmt_resettokens: SqliteDB.Statement;

  protected kvstore_get: (k: string) => string | null;
  protected kvstore_set: (k: string, v: string | null) => void;

  constructor({ file, now }: { file: string; now?: () => Date }) {
    this.now = now || (() => new Date());
    this.db = new SqliteDB(file);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS push_tokens (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        selector TEXT NOT NULL UNIQUE,
        token_msgs TEXT,
        appid_msgs TEXT,
        token_calls TEXT,
        appid_calls TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS kvstore (
        key TEXT PRIMARY KEY NOT NULL,
        value TEXT NOT NULL,
        UNIQUE (key)
      );
    `);

    this.stmt_savetoken = this.db.prepare(`
      INSERT INTO push_tokens
        (selector, token_msgs, appid_msgs, token_calls, appid_calls, created_at, updated_at)
      VALUES ($selector, $token_msgs, $appid_msgs, $token_calls, $appid_calls, $now, $now)
      ON CONFLICT (selector) DO UPDATE SET
        token_msgs = excluded.token_msgs,
        appid_msgs = excluded.appid_msgs,
        token_calls = excluded.token_calls,
        appid_calls = excluded.appid_calls,
        updated_at = excluded.updated_at
    `);
    const columns = 'selector, token_msgs, appid_msgs, token_calls, appid_calls, created_at, updated_at';
    this.stmt_gettoken_sel = this.db.prepare(`SELECT ${columns} FROM push_tokens WHERE selector = ?`);
    this.stmt_gettoken_key = this.db.prepare(
      `SELECT ${columns} FROM push_tokens WHERE token_msgs = $key OR token_calls = $key ORDER BY id LIMIT 1`,
    );
    this.stmt_listtokens = this.db.prepare(`SELECT ${columns} FROM push_tokens ORDER BY id`);
    this.stmt_deltoken = this.db.prepare('DELETE FROM push_tokens WHERE selector = ?');
    this.stmt_resettokens = this.db.prepare('DELETE FROM push_tokens');

    const stmt_kvget = this.db.prepare('SELECT value FROM kvstore WHERE key = ?');
    const stmt_kvins = this.db.prepare('INSERT INTO kvstore VALUES (?, ?)');
    const stmt_kvdel = this.db.prepare('DELETE FROM kvstore WHERE key = ?');
    this.kvstore_get = (k: string): string | null => {
      const row: unknown = stmt_kvget.get(k);
      return typeof row === 'object' && row !== null ? textColumn(row, 'value') : null;
    };
    this.kvstore_set = this.db.transaction((k: string, v: string | null): void => {
      stmt_kvdel.run(k);
      if (v) {
        stmt_kvins.run(k, v);
      }
    });
  }

  async getBySelector(selector: string): Promise<IPushTokenRecord | null> {
    return toPushTokenRecord(this.stmt_gettoken_sel.get(selector));
  }
  async getByPushkey(key: string): Promise<IPushTokenRecord | null> {
    if (!key) {
      return null;
    }
    return toPushTokenRecord(this.stmt_gettoken_key.get({ key }));
  }
  async save(record: IPushTokenInput): Promise<void> {
    this.stmt_savetoken.run({
      selector: record.selector,
      token_msgs: record.tokenMsgs,
      appid_msgs: record.appIdMsgs,
      token_calls: record.tokenCalls,
      appid_calls: record.appIdCalls,
      now: this.now().toISOString(),
    });
    log.debug(`Saved push token for ${record.selector}`);
  }
  async list(): Promise<IPushTokenRecord[]> {
    const records: IPushTokenRecord[] = [];
    for (const row of this.stmt_listtokens.all()) {
      const record = toPushTokenRecord(row);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }
  async delete(selector: string): Promise<void> {
    this.stmt_deltoken.run(selector);
  }
  async reset(): Promise<void> {
    const { changes } = this.stmt_resettokens.run();
    log.info(`Deleted ${changes} push tokens`);
  }

  addRegisteredUser(userId: string): void {
    const key = hash.sha512().update(userId).digest('hex');
    this.kvstore_set(`appserviceUsers.${key}.registered`, 'true');
  }
  isUserRegistered(userId: string): boolean {
    const key = hash.sha512().update(userId).digest('hex');
    return this.kvstore_get(`appserviceUsers.${key}.registered`) === 'true';
  }

  isTransactionCompleted(id: string): boolean {
    return this.txns.has(id);
  }
  setTransactionCompleted(id: string): void {
    this.txns.add(id);
  }

  close(): void {
    this.db.close();
  }
}
