import { ok, type Result, type StorageUnavailable } from '../../src/domain/types.js';
import { guard, type Db, type LoginRow } from './db.js';

const MAX_RECENT = 100;

/** Append-only log of successful logins */
export class LoginJournal {
  constructor(
    private readonly db: Db,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Best effort: a failed write is logged, never thrown */
  recordLogin(user: string): void {
    try {
      this.db.prepare<[string, string]>('INSERT INTO logins (username, ts) VALUES (?, ?)')
        .run(user, this.now().toISOString());
    } catch (error) {
      console.warn(`Could not record login for ${user}:`, error);
    }
  }

  /** Timestamps, most recent first */
  recentLogins(user: string, limit: number): Result<string[], StorageUnavailable> {
    const n = Number.isFinite(limit) ? Math.min(MAX_RECENT, Math.max(0, Math.floor(limit))) : 0;
    return guard<string[], never>('fetching logins', () => {
      const rows = this.db.prepare<[string, number], LoginRow>(`
        SELECT ts FROM logins WHERE username = ?
        ORDER BY ts DESC, id DESC
        LIMIT ?
      `).all(user, n);
      return ok(rows.map((r) => r.ts));
    });
  }
}
