import fs from 'fs';
import path from 'path';
import initSqlJs from 'sql.js';
import type { BindParams, Database, SqlJsStatic, SqlValue } from 'sql.js';
import type { CycleStore, OrderRecord } from './exchanges/types';
import type { AveragePair, OrderSide } from './strategy/types';

export const DEFAULT_DB_PATH = path.join(process.cwd(), 'data', 'crossover.sqlite');

const IN_MEMORY = ':memory:';

export interface SqliteCycleStore extends CycleStore {
  close(): void;
}

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) sqlJs = initSqlJs();
  return sqlJs;
}

async function openDb(dbPath: string): Promise<Database> {
  const SQL = await loadSqlJs();
  let db: Database;
  if (dbPath === IN_MEMORY) {
    db = new SQL.Database();
  } else {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    db = fs.existsSync(dbPath) ? new SQL.Database(fs.readFileSync(dbPath)) : new SQL.Database();
  }
  db.exec(`
    CREATE TABLE IF NOT EXISTS strategy_state (
      symbol TEXT PRIMARY KEY,
      short_ma REAL NOT NULL,
      long_ma REAL NOT NULL,
      updated_ts INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS orders (
      ts INTEGER NOT NULL,
      symbol TEXT NOT NULL,
      side TEXT NOT NULL,
      qty INTEGER NOT NULL,
      status TEXT NOT NULL,
      order_id TEXT,
      client_order_id TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_orders_symbol_ts ON orders(symbol, ts);
  `);
  return db;
}

/** Runs a query and returns each row's columns in SELECT order. */
function selectRows(db: Database, sql: string, params: BindParams): SqlValue[][] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: SqlValue[][] = [];
    while (stmt.step()) rows.push(stmt.get());
    return rows;
  } finally {
    stmt.free();
  }
}

function asNumber(value: SqlValue, column: string): number {
  if (typeof value === 'number') return value;
  throw new Error(`unexpected value in column ${column}: ${String(value)}`);
}

function asString(value: SqlValue, column: string): string {
  if (typeof value === 'string') return value;
  throw new Error(`unexpected value in column ${column}: ${String(value)}`);
}

function asOptionalString(value: SqlValue, column: string): string | undefined {
  return value === null ? undefined : asString(value, column);
}

function toSide(value: string): OrderSide {
  if (value === 'buy' || value === 'sell') return value;
  throw new Error(`unexpected order side in store: ${value}`);
}

export async function createSqliteStore(dbPath: string = DEFAULT_DB_PATH): Promise<SqliteCycleStore> {
  const db = await openDb(dbPath);

  // sql.js keeps the database in memory; write the file back after every change.
  const persist = (): void => {
    if (dbPath !== IN_MEMORY) fs.writeFileSync(dbPath, Buffer.from(db.export()));
  };

  return {
    loadPriorAverages(symbol: string): AveragePair | null {
      const [row] = selectRows(db, `SELECT short_ma, long_ma FROM strategy_state WHERE symbol = ?`, [symbol]);
      return row ? { short: asNumber(row[0], 'short_ma'), long: asNumber(row[1], 'long_ma') } : null;
    },

    savePriorAverages(symbol: string, pair: AveragePair | null, ts: number): void {
      if (!pair) {
        db.run(`DELETE FROM strategy_state WHERE symbol = ?`, [symbol]);
      } else {
        db.run(
          `INSERT INTO strategy_state (symbol, short_ma, long_ma, updated_ts)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(symbol) DO UPDATE SET short_ma=excluded.short_ma, long_ma=excluded.long_ma, updated_ts=excluded.updated_ts`,
          [symbol, pair.short, pair.long, ts],
        );
      }
      persist();
    },

    recordOrder(order: OrderRecord): void {
      db.run(
        `INSERT INTO orders (ts, symbol, side, qty, status, order_id, client_order_id)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [
          order.ts,
          order.symbol,
          order.side,
          order.qty,
          order.status,
          order.orderId ?? null,
          order.clientOrderId ?? null,
        ],
      );
      persist();
    },

    recentOrders(limit = 20): OrderRecord[] {
      const rows = selectRows(
        db,
        `SELECT ts, symbol, side, qty, status, order_id, client_order_id
         FROM orders
         ORDER BY ts DESC, rowid DESC
         LIMIT ?`,
        [limit],
      );
      return rows.map((r) => ({
        ts: asNumber(r[0], 'ts'),
        symbol: asString(r[1], 'symbol'),
        side: toSide(asString(r[2], 'side')),
        qty: asNumber(r[3], 'qty'),
        status: asString(r[4], 'status'),
        orderId: asOptionalString(r[5], 'order_id'),
        clientOrderId: asOptionalString(r[6], 'client_order_id'),
      }));
    },

    close(): void {
      db.close();
    },
  };
}
