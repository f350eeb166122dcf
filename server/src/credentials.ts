import bcrypt from 'bcrypt';
import { checkEmail, checkPassword, checkUsername, tooLongToHash } from '../../src/domain/validation.js';
import {
  err,
  notFound,
  ok,
  type AuthenticationError,
  type NotFoundError,
  type PasswordChangeError,
  type RegistrationError,
  type Result,
  type StorageUnavailable,
  type ValidationError,
} from '../../src/domain/types.js';
import { guard, type Db, type UserRow } from './db.js';

/**
 * Users and their bcrypt password hashes.
 * Hashes never leave this class.
 */
export class CredentialStore {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly db: Db,
    private readonly rounds: number = 10,
  ) {}

  async register(username: string, password: string, email?: string): Promise<Result<void, RegistrationError>> {
    const name = checkUsername(username);
    if (!name.ok) return name;
    const pw = checkPassword(password);
    if (!pw.ok) return pw;
    if (email !== undefined) {
      const mail = checkEmail(email);
      if (!mail.ok) return mail;
    }

    const taken = this.exists(username);
    if (!taken.ok) return taken;
    if (taken.value) return err(duplicate(username));

    // Hash outside any transaction
    const hash = await bcrypt.hash(password, this.rounds);

    return guard<void, RegistrationError>('registering user', () => {
      // Losing a concurrent race for the same name inserts nothing
      const result = this.db.prepare<[string, string, string | null]>(`
        INSERT INTO users (username, password_hash, email) VALUES (?, ?, ?)
        ON CONFLICT(username) DO NOTHING
      `).run(username, hash, email ?? null);
      return result.changes === 1 ? ok(undefined) : err(duplicate(username));
    });
  }

  /**
   * True only for a known user with the right password. Unknown users are
   * checked against a dummy hash so both failures cost the same.
   */
  async authenticate(username: string, password: string): Promise<boolean> {
    // No stored password is this long, and bcrypt would compare only a prefix
    if (tooLongToHash(password)) return false;
    const row = this.findUser(username);
    if (!row.ok) return false;
    if (!row.value) {
      await bcrypt.compare(password, await this.getDummyHash());
      return false;
    }
    return bcrypt.compare(password, row.value.password_hash);
  }

  async changePassword(
    username: string,
    currentPassword: string,
    newPassword: string,
  ): Promise<Result<void, PasswordChangeError>> {
    if (!(await this.authenticate(username, currentPassword))) {
      const error: AuthenticationError = {
        type: 'AuthenticationError',
        code: 'IncorrectCurrentPassword',
        message: 'Current password is incorrect',
      };
      return err(error);
    }
    const pw = checkPassword(newPassword);
    if (!pw.ok) return pw;

    const hash = await bcrypt.hash(newPassword, this.rounds);

    return guard<void, PasswordChangeError>('changing password', () => {
      this.db.prepare<[string, string]>('UPDATE users SET password_hash = ? WHERE username = ?')
        .run(hash, username);
      return ok(undefined);
    });
  }

  /** Set or clear the address used for summary emails */
  setEmail(
    username: string,
    email: string | null,
  ): Result<void, ValidationError | NotFoundError | StorageUnavailable> {
    if (email !== null) {
      const mail = checkEmail(email);
      if (!mail.ok) return mail;
    }
    return guard<void, ValidationError | NotFoundError>('updating email', () => {
      const result = this.db.prepare<[string | null, string]>('UPDATE users SET email = ? WHERE username = ?')
        .run(email, username);
      return result.changes === 0 ? err(notFound(`User not found: ${username}`)) : ok(undefined);
    });
  }

  getEmail(username: string): Result<string | null, StorageUnavailable> {
    const row = this.findUser(username);
    if (!row.ok) return row;
    return ok(row.value?.email ?? null);
  }

  private exists(username: string): Result<boolean, StorageUnavailable> {
    const row = this.findUser(username);
    if (!row.ok) return row;
    return ok(row.value !== undefined);
  }

  private findUser(username: string): Result<UserRow | undefined, StorageUnavailable> {
    return guard<UserRow | undefined, never>('looking up user', () =>
      ok(this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?').get(username)));
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = bcrypt.hash('dummy-password-for-timing', this.rounds);
    }
    return this.dummyHash;
  }
}

function duplicate(username: string): RegistrationError {
  return { type: 'ConflictError', code: 'DuplicateUsername', message: `Username already exists: ${username}` };
}
