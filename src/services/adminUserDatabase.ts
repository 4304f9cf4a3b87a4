import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { AdminUser } from '../types';
import { logger } from '../utils/logger';

interface AdminUserRow {
  username: string;
  password_hash: string;
  totp_enabled: number;
  totp_secret: string;
  created_at: string;
}

function toAdminUser(row: AdminUserRow): AdminUser {
  return {
    username: row.username,
    passwordHash: row.password_hash,
    totpEnabled: row.totp_enabled === 1,
    totpSecret: row.totp_secret,
    createdAt: row.created_at,
  };
}

/**
 * Admin user store
 * SQLite table of panel users (argon2 password hash, optional TOTP secret).
 */
export class AdminUserDatabase {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string = './db/admin.db') {}

  /**
   * Open the database and create the users table if needed
   */
  initialize(): void {
    if (this.db) {
      return;
    }

    try {
      if (this.dbPath !== ':memory:') {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }

      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.createTable();
      logger.info('Admin user database connected', { path: this.dbPath });
    } catch (error) {
      logger.error('Failed to open admin user database', {
        path: this.dbPath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private createTable(): void {
    this.assertReady().exec(
      `CREATE TABLE IF NOT EXISTS admin_users(
        username TEXT PRIMARY KEY,
        password_hash TEXT NOT NULL,
        totp_enabled INTEGER NOT NULL DEFAULT 0,
        totp_secret TEXT NOT NULL DEFAULT '',
        created_at TEXT NOT NULL
      )`
    );
  }

  private assertReady(): Database.Database {
    if (!this.db) {
      throw new Error('Admin user database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  countUsers(): number {
    const row = this.assertReady()
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM admin_users')
      .get();
    return row ? row.count : 0;
  }

  listUsers(): AdminUser[] {
    return this.assertReady()
      .prepare<[], AdminUserRow>(
        'SELECT username, password_hash, totp_enabled, totp_secret, created_at FROM admin_users ORDER BY username'
      )
      .all()
      .map(toAdminUser);
  }

  getUser(username: string): AdminUser | undefined {
    const row = this.assertReady()
      .prepare<[string], AdminUserRow>(
        'SELECT username, password_hash, totp_enabled, totp_secret, created_at FROM admin_users WHERE username = ?'
      )
      .get(username);
    return row ? toAdminUser(row) : undefined;
  }

  /**
   * Insert a user; false when the username is taken
   */
  createUser(username: string, passwordHash: string): boolean {
    const result = this.assertReady()
      .prepare<[string, string, string]>(
        'INSERT OR IGNORE INTO admin_users(username, password_hash, created_at) VALUES(?, ?, ?)'
      )
      .run(username, passwordHash, new Date().toISOString());

    if (result.changes > 0) {
      logger.info(`Created admin user: ${username}`);
      return true;
    }
    return false;
  }

  updatePassword(username: string, passwordHash: string): boolean {
    const result = this.assertReady()
      .prepare<[string, string]>('UPDATE admin_users SET password_hash = ? WHERE username = ?')
      .run(passwordHash, username);
    return result.changes > 0;
  }

  /**
   * Store a pending TOTP secret; it is not enforced until enableTotp()
   */
  setTotpSecret(username: string, secret: string): boolean {
    const result = this.assertReady()
      .prepare<[string, string]>('UPDATE admin_users SET totp_secret = ?, totp_enabled = 0 WHERE username = ?')
      .run(secret, username);
    return result.changes > 0;
  }

  enableTotp(username: string): boolean {
    const result = this.assertReady()
      .prepare<[string]>("UPDATE admin_users SET totp_enabled = 1 WHERE username = ? AND totp_secret <> ''")
      .run(username);
    return result.changes > 0;
  }

  disableTotp(username: string): boolean {
    const result = this.assertReady()
      .prepare<[string]>("UPDATE admin_users SET totp_enabled = 0, totp_secret = '' WHERE username = ?")
      .run(username);
    return result.changes > 0;
  }

  deleteUser(username: string): boolean {
    const result = this.assertReady()
      .prepare<[string]>('DELETE FROM admin_users WHERE username = ?')
      .run(username);
    if (result.changes > 0) {
      logger.info(`Deleted admin user: ${username}`);
      return true;
    }
    return false;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      logger.info('Admin user database connection closed');
    }
  }
}
