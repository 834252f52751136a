/**
 * CRM Store — SQLite-backed record tables
 *
 * Owns one better-sqlite3 connection and exposes typed row primitives
 * over the contacts, deals and activities tables. Knows nothing about
 * business rules beyond the storage-level UNIQUE constraint on
 * contacts.email.
 *
 * Usage:
 *   const store = new CRMStore(':memory:');
 *   store.init();
 *   store.insert('contacts', row);
 *   const leads = store.findWhere('contacts', { status: 'lead' });
 *   store.close();
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { createLogger } from '../utils/logger.js';
import { DuplicateEmailError, InvalidValueError } from './errors.js';
import {
  CREATE_INDEX_SQL,
  CREATE_TABLES_SQL,
  ROW_SCHEMAS,
  TABLE_COLUMNS,
  type ColumnOf,
  type TableName,
  type TableRows,
} from './schema.js';

const log = createLogger('crm-store');

// ─── Types ──────────────────────────────────────────────────────────────────

export type RowFilter<T extends TableName> = Partial<TableRows[T]>;

export type RowChanges<T extends TableName> = Partial<Omit<TableRows[T], 'id'>>;

export interface OrderBy<T extends TableName> {
  column: ColumnOf<T>;
  direction?: 'ASC' | 'DESC';
}

export interface FindOptions<T extends TableName> {
  orderBy?: Array<OrderBy<T>>;
  limit?: number;
}

type SqlValue = string | number | bigint | Buffer | null;

// ─── CRMStore ───────────────────────────────────────────────────────────────

export class CRMStore {
  private db: Database.Database | null = null;
  private readonly dbPath: string;

  constructor(dbPath: string = ':memory:') {
    this.dbPath = dbPath;
  }

  /**
   * Open the database and create tables and indexes. Safe to call twice.
   */
  init(): void {
    if (this.db) return;

    if (this.dbPath !== ':memory:') {
      mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = OFF');

    this.db.exec(CREATE_TABLES_SQL);
    this.db.exec(CREATE_INDEX_SQL);

    log.debug({ dbPath: this.dbPath }, 'CRM store initialized');
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  insert<T extends TableName>(table: T, row: TableRows[T]): void {
    const columns = TABLE_COLUMNS[table];
    const bindings = this.toBindings(table, row);

    try {
      this.connection
        .prepare(
          `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map((c) => `@${c}`).join(', ')})`,
        )
        .run(bindings);
    } catch (error) {
      throw this.constraintError(error, bindings);
    }
  }

  findById<T extends TableName>(table: T, id: string): TableRows[T] | null {
    const row: unknown = this.connection.prepare(`SELECT * FROM ${table} WHERE id = ?`).get(id);
    return row === undefined ? null : ROW_SCHEMAS[table].parse(row);
  }

  findWhere<T extends TableName>(
    table: T,
    filter: RowFilter<T> = {},
    options: FindOptions<T> = {},
  ): Array<TableRows[T]> {
    const { clause, params } = this.whereClause(table, filter);
    let sql = `SELECT * FROM ${table}${clause}`;

    if (options.orderBy && options.orderBy.length > 0) {
      const order = options.orderBy.map(({ column, direction }) => {
        this.assertColumn(table, column);
        return `${column} ${direction ?? 'ASC'}`;
      });
      sql += ` ORDER BY ${order.join(', ')}`;
    }

    if (options.limit !== undefined) {
      sql += ' LIMIT @__limit';
      params.__limit = options.limit;
    }

    const rows: unknown[] = this.connection.prepare(sql).all(params);
    return rows.map((row) => ROW_SCHEMAS[table].parse(row));
  }

  /**
   * Apply column changes to one row. Returns false when no row matched
   * or there was nothing to change.
   */
  updateById<T extends TableName>(table: T, id: string, changes: RowChanges<T>): boolean {
    const bindings: Record<string, SqlValue> = {};
    const assignments: string[] = [];

    for (const [column, value] of Object.entries(changes)) {
      if (value === undefined) continue;
      this.assertColumn(table, column);
      if (column === 'id') continue;
      assignments.push(`${column} = @${column}`);
      bindings[column] = this.toSqlValue(column, value);
    }

    if (assignments.length === 0) return false;
    bindings.__id = id;

    try {
      const result = this.connection
        .prepare(`UPDATE ${table} SET ${assignments.join(', ')} WHERE id = @__id`)
        .run(bindings);
      return result.changes > 0;
    } catch (error) {
      throw this.constraintError(error, bindings);
    }
  }

  deleteById(table: TableName, id: string): boolean {
    const result = this.connection.prepare(`DELETE FROM ${table} WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  count<T extends TableName>(table: T, filter: RowFilter<T> = {}): number {
    const { clause, params } = this.whereClause(table, filter);
    const row: unknown = this.connection
      .prepare(`SELECT COUNT(*) AS count FROM ${table}${clause}`)
      .get(params);
    return this.readCount(row);
  }

  /**
   * Row counts grouped by one column's value.
   */
  groupCount<T extends TableName>(table: T, column: ColumnOf<T>): Map<string, number> {
    this.assertColumn(table, column);
    const rows: unknown[] = this.connection
      .prepare(`SELECT ${column} AS key, COUNT(*) AS count FROM ${table} GROUP BY ${column}`)
      .all();

    const counts = new Map<string, number>();
    for (const row of rows) {
      if (typeof row !== 'object' || row === null || !('key' in row)) continue;
      counts.set(String(row.key), this.readCount(row));
    }
    return counts;
  }

  /**
   * Run a read-only aggregate statement. Callers decode the rows.
   */
  query(sql: string, params: Record<string, SqlValue> = {}): unknown[] {
    return this.connection.prepare(sql).all(params);
  }

  /**
   * Run fn inside a transaction: every write commits together or none do.
   */
  transaction<R>(fn: () => R): R {
    return this.connection.transaction(fn)();
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      log.debug({ dbPath: this.dbPath }, 'CRM store closed');
    }
  }

  // ─── Private Helpers ────────────────────────────────────────────────────────

  private get connection(): Database.Database {
    if (!this.db) {
      throw new Error('CRMStore not initialized. Call init() first.');
    }
    return this.db;
  }

  private assertColumn(table: TableName, column: string): void {
    const known: ReadonlyArray<string> = TABLE_COLUMNS[table];
    if (!known.includes(column)) {
      throw new InvalidValueError('column', column, `unknown column on ${table}`);
    }
  }

  private whereClause<T extends TableName>(
    table: T,
    filter: RowFilter<T>,
  ): { clause: string; params: Record<string, SqlValue> } {
    const conditions: string[] = [];
    const params: Record<string, SqlValue> = {};

    for (const [column, value] of Object.entries(filter)) {
      if (value === undefined) continue;
      this.assertColumn(table, column);
      if (value === null) {
        conditions.push(`${column} IS NULL`);
      } else {
        conditions.push(`${column} = @${column}`);
        params[column] = this.toSqlValue(column, value);
      }
    }

    return {
      clause: conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '',
      params,
    };
  }

  private toBindings<T extends TableName>(table: T, row: TableRows[T]): Record<string, SqlValue> {
    const bindings: Record<string, SqlValue> = {};
    for (const column of TABLE_COLUMNS[table]) {
      bindings[column] = this.toSqlValue(column, row[column]);
    }
    return bindings;
  }

  private toSqlValue(column: string, value: unknown): SqlValue {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
      return value;
    }
    if (Buffer.isBuffer(value)) return value;
    throw new InvalidValueError(column, value, 'not storable');
  }

  private readCount(row: unknown): number {
    if (typeof row === 'object' && row !== null && 'count' in row && typeof row.count === 'number') {
      return row.count;
    }
    return 0;
  }

  private constraintError(error: unknown, bindings: Record<string, SqlValue>): unknown {
    if (
      error instanceof Database.SqliteError &&
      error.code === 'SQLITE_CONSTRAINT_UNIQUE' &&
      error.message.includes('contacts.email')
    ) {
      const email = bindings.email;
      log.warn({ email }, 'Rejected duplicate email at storage layer');
      return new DuplicateEmailError(typeof email === 'string' ? email : String(email), undefined, error);
    }
    return error;
  }
}
