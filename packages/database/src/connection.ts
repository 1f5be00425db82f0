/**
 * Database Connection
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { createChildLogger, DatabaseError } from '@remedyops/shared';
import * as schema from './schema.js';

export type DatabaseConnection = BetterSQLite3Database<typeof schema>;

export interface DatabaseConfig {
  path: string;
  verbose?: boolean;
}

const logger = createChildLogger({ component: 'Database' });

let dbInstance: DatabaseConnection | null = null;
let sqliteInstance: Database.Database | null = null;

/**
 * Initialize database connection
 */
export function initializeDatabase(config: DatabaseConfig): DatabaseConnection {
  if (dbInstance) {
    return dbInstance;
  }

  logger.info({ path: config.path }, 'Initializing database');

  sqliteInstance = new Database(config.path, {
    verbose: config.verbose ? (msg) => logger.debug({ sql: msg }, 'sql') : undefined,
  });

  // WAL is not available for in-memory databases
  if (config.path !== ':memory:') {
    sqliteInstance.pragma('journal_mode = WAL');
  }
  sqliteInstance.pragma('foreign_keys = ON');

  createTablesIfNotExist(sqliteInstance);

  dbInstance = drizzle(sqliteInstance, { schema });

  logger.info('Database initialized successfully');

  return dbInstance;
}

/**
 * Create database tables if they don't exist
 */
function createTablesIfNotExist(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS incidents (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      description TEXT NOT NULL,
      service_name TEXT NOT NULL,
      fault_type TEXT,
      impact_severity TEXT NOT NULL CHECK (impact_severity IN ('low', 'medium', 'high', 'critical')),
      approval_severity TEXT NOT NULL CHECK (approval_severity IN ('low', 'medium', 'high', 'blocker')),
      status TEXT NOT NULL CHECK (status IN ('detected', 'diagnosing', 'fix_proposed', 'awaiting_approval', 'deploying', 'resolved', 'rejected')),
      impact_analysis TEXT NOT NULL,
      error_evidence TEXT NOT NULL,
      root_cause TEXT,
      diagnosis TEXT,
      diagnosis_category TEXT,
      proposed_fix TEXT,
      fix_diff TEXT,
      fix_code TEXT,
      test_code TEXT,
      risk_level TEXT CHECK (risk_level IN ('low', 'medium', 'high')),
      confidence_score REAL NOT NULL DEFAULT 0,
      safety_result TEXT,
      safety_passed INTEGER,
      auto_resolved INTEGER NOT NULL DEFAULT 0,
      reported_by TEXT NOT NULL,
      assigned_to TEXT NOT NULL,
      cleared_by TEXT,
      cleared_at INTEGER,
      detected_at INTEGER NOT NULL,
      resolved_at INTEGER,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_incidents_status ON incidents(status);
    CREATE INDEX IF NOT EXISTS idx_incidents_fault_type ON incidents(fault_type);

    CREATE TABLE IF NOT EXISTS approvals (
      id TEXT PRIMARY KEY,
      incident_id TEXT NOT NULL REFERENCES incidents(id),
      user_name TEXT NOT NULL,
      user_role TEXT CHECK (user_role IN ('junior_dev', 'senior_dev', 'tech_lead', 'engineering_manager', 'cto')),
      action TEXT NOT NULL CHECK (action IN ('approve', 'reject', 'override', 'request_changes')),
      comment TEXT NOT NULL DEFAULT '',
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_approvals_incident ON approvals(incident_id);

    CREATE TABLE IF NOT EXISTS comments (
      id TEXT PRIMARY KEY,
      incident_id TEXT NOT NULL REFERENCES incidents(id),
      user_name TEXT NOT NULL,
      content TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_comments_incident ON comments(incident_id);

    CREATE TABLE IF NOT EXISTS learning_records (
      id TEXT PRIMARY KEY,
      incident_type TEXT NOT NULL,
      error_pattern TEXT NOT NULL,
      proposed_fix_pattern TEXT NOT NULL,
      human_decision TEXT NOT NULL CHECK (human_decision IN ('approved', 'rejected', 'modified')),
      confidence_adjustment REAL NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_learning_records_type ON learning_records(incident_type);

    CREATE TABLE IF NOT EXISTS activity_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      incident_id TEXT,
      actor TEXT NOT NULL,
      action TEXT NOT NULL,
      detail TEXT NOT NULL DEFAULT '',
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_activity_log_incident ON activity_log(incident_id);

    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      role TEXT NOT NULL CHECK (role IN ('junior_dev', 'senior_dev', 'tech_lead', 'engineering_manager', 'cto')),
      final_authority INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL
    );
  `);

  logger.info('Database tables created/verified');
}

/**
 * Get database instance
 */
export function getDatabase(): DatabaseConnection {
  if (!dbInstance) {
    throw new DatabaseError('Database not initialized. Call initializeDatabase first.');
  }
  return dbInstance;
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (sqliteInstance) {
    sqliteInstance.close();
    sqliteInstance = null;
    dbInstance = null;
    logger.info('Database connection closed');
  }
}
