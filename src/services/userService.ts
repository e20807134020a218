import { DatabaseConnection } from '../types/database.js';
import { BotUser } from '../types/bot.js';
import { logger } from '../middleware/logging.js';

export interface UserRow {
  user_id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  joined_at: string;
  last_seen_at: string;
}

/**
 * Users and the admin allow-list
 */
export class UserService {
  constructor(
    private readonly db: DatabaseConnection,
    private readonly configuredAdminIds: readonly number[] = []
  ) {}

  /**
   * Record an interaction. joined_at is only written on first contact;
   * profile fields and last_seen_at are refreshed every time.
   */
  async upsert(user: BotUser): Promise<void> {
    await this.db.execute(
      `INSERT INTO users (user_id, username, first_name, last_name)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(user_id) DO UPDATE SET
         username = excluded.username,
         first_name = excluded.first_name,
         last_name = excluded.last_name,
         last_seen_at = CURRENT_TIMESTAMP`,
      [user.id, user.username ?? null, user.firstName ?? null, user.lastName ?? null]
    );
  }

  async getUser(userId: number): Promise<UserRow | undefined> {
    return this.db.get<UserRow>('SELECT * FROM users WHERE user_id = ?', [userId]);
  }

  async countUsers(): Promise<number> {
    const row = await this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM users');
    return row?.count ?? 0;
  }

  async listUserIds(): Promise<number[]> {
    const rows = await this.db.query<{ user_id: number }>('SELECT user_id FROM users ORDER BY user_id');
    return rows.map(row => row.user_id);
  }

  // ============================================
  // Admins
  // ============================================

  /**
   * Copy the configured admin ids into the admins table, only when it is
   * still empty. Returns the number of ids inserted.
   */
  async seedAdmins(adminIds: readonly number[] = this.configuredAdminIds): Promise<number> {
    const row = await this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM admins');
    if ((row?.count ?? 0) > 0 || adminIds.length === 0) {
      return 0;
    }

    let inserted = 0;
    for (const adminId of adminIds) {
      const result = await this.db.execute('INSERT OR IGNORE INTO admins (user_id) VALUES (?)', [adminId]);
      inserted += result.affectedRows;
    }

    logger.info('Seeded admins from configuration', { count: inserted });
    return inserted;
  }

  async isAdmin(userId: number): Promise<boolean> {
    if (this.configuredAdminIds.includes(userId)) {
      return true;
    }
    const row = await this.db.get<{ user_id: number }>('SELECT user_id FROM admins WHERE user_id = ?', [userId]);
    return row !== undefined;
  }
}
