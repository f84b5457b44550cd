/**
 * Database Client
 * Kysely PostgreSQL connection with connection pooling
 */

import { Kysely, PostgresDialect, sql } from 'kysely';
import pg from 'pg';
import type { Database } from './types.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('Database');

// ═══════════════════════════════════════════════════════════════
// DATABASE INSTANCE
// ═══════════════════════════════════════════════════════════════

let db: Kysely<Database> | null = null;

export function getDb(): Kysely<Database> {
  if (!db) {
    throw new Error('Database not initialized. Call initDb() first.');
  }
  return db;
}

export async function initDb(connectionString: string): Promise<Kysely<Database>> {
  if (db) {
    logger.info('Database already initialized');
    return db;
  }

  logger.info('Initializing database connection...');

  const dialect = new PostgresDialect({
    pool: new pg.Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    }),
  });

  const instance = new Kysely<Database>({ dialect });

  try {
    await sql`SELECT 1`.execute(instance);
    logger.info('Database connection established successfully');
  } catch (error) {
    logger.error('Failed to connect to database', { error });
    await instance.destroy();
    throw error;
  }

  db = instance;
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    logger.info('Database connection closed');
  }
}

/**
 * Create tables and indexes if they do not exist
 */
export async function runMigrations(database: Kysely<Database> = getDb()): Promise<void> {
  logger.info('Running database migrations...');

  await database.schema
    .createTable('market_snapshots')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('timestamp', 'timestamptz', (col) => col.notNull())
    .addColumn('instrument', 'varchar(20)', (col) => col.notNull())
    .addColumn('asset_class', 'varchar(10)', (col) => col.notNull())
    .addColumn('direction', 'varchar(5)', (col) => col.notNull())
    .addColumn('session', 'varchar(20)')
    .addColumn('htf_trend', 'varchar(20)', (col) => col.notNull())
    .addColumn('htf_structure', 'varchar(50)', (col) => col.notNull())
    .addColumn('key_level', 'double precision', (col) => col.notNull())
    .addColumn('liquidity_event_type', 'varchar(50)')
    .addColumn('has_large_wick', 'boolean', (col) => col.notNull())
    .addColumn('atr_value', 'double precision')
    .addColumn('rsi_divergence', 'boolean', (col) => col.notNull())
    .addColumn('vwap_distance', 'double precision')
    .addColumn('spread_value', 'double precision', (col) => col.notNull())
    .addColumn('news_event_proximity_minutes', 'double precision')
    .addColumn('premium_position', 'double precision', (col) => col.notNull())
    .addColumn('zone', 'varchar(20)', (col) => col.notNull())
    .addColumn('bearish_ob_count', 'integer', (col) => col.notNull())
    .addColumn('bullish_ob_count', 'integer', (col) => col.notNull())
    .addColumn('fvg_count', 'integer', (col) => col.notNull())
    .addColumn('has_bearish_mss', 'boolean', (col) => col.notNull())
    .addColumn('has_bullish_mss', 'boolean', (col) => col.notNull())
    .execute();

  await database.schema
    .createTable('trade_plans')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('snapshot_id', 'integer', (col) => col.notNull().references('market_snapshots.id'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addColumn('direction', 'varchar(5)', (col) => col.notNull())
    .addColumn('entry_zone_start', 'double precision', (col) => col.notNull())
    .addColumn('entry_zone_end', 'double precision', (col) => col.notNull())
    .addColumn('stop_loss', 'double precision', (col) => col.notNull())
    .addColumn('tp1', 'double precision', (col) => col.notNull())
    .addColumn('tp2', 'double precision')
    .addColumn('estimated_rr', 'double precision', (col) => col.notNull())
    .addColumn('probability_score', 'double precision', (col) => col.notNull())
    .addColumn('score_source', 'varchar(20)', (col) => col.notNull())
    .addColumn('status', 'varchar(20)', (col) => col.notNull().defaultTo('PENDING'))
    .execute();

  await database.schema
    .createTable('trade_outcomes')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('plan_id', 'integer', (col) => col.notNull().references('trade_plans.id'))
    .addColumn('entry_price', 'double precision', (col) => col.notNull())
    .addColumn('exit_price', 'double precision', (col) => col.notNull())
    .addColumn('outcome', 'varchar(10)', (col) => col.notNull())
    .addColumn('realized_r_multiple', 'double precision', (col) => col.notNull())
    .addColumn('pnl_percent', 'double precision')
    .addColumn('comments', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .execute();

  await database.schema
    .createTable('learning_logs')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('review_date', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addColumn('sample_size', 'integer', (col) => col.notNull())
    .addColumn('high_performing_conditions', 'text')
    .addColumn('loss_prone_conditions', 'text')
    .addColumn('action_items', 'text')
    .execute();

  logger.info('Creating indexes...');

  await sql`CREATE INDEX IF NOT EXISTS idx_snapshot_session ON market_snapshots(session)`.execute(database);
  await sql`CREATE INDEX IF NOT EXISTS idx_outcome_r ON trade_outcomes(realized_r_multiple)`.execute(database);
  await sql`CREATE INDEX IF NOT EXISTS idx_plans_snapshot ON trade_plans(snapshot_id)`.execute(database);

  logger.info('Database migrations completed successfully');
}
