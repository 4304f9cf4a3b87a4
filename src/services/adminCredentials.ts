import argon2 from 'argon2';
import { authenticator } from 'otplib';
import QRCode from 'qrcode';
import type { AdminUser, PublicAdminUser } from '../types';
import { logger } from '../utils/logger';
import type { AdminUserDatabase } from './adminUserDatabase';

export const MIN_PASSWORD_LENGTH = 6;
export const TOTP_ISSUER = 'WoL Gateway';

// Accept the previous and next 30 second step for clock drift
authenticator.options = { window: 1 };

export type LoginResult =
  | { ok: true; user: PublicAdminUser }
  | { ok: false; reason: 'INVALID_CREDENTIALS' | 'TOTP_REQUIRED' | 'INVALID_TOTP' };

export interface TotpEnrollment {
  secret: string;
  otpauthUrl: string;
  qrDataUrl: string;
}

export function toPublicUser(user: AdminUser): PublicAdminUser {
  return {
    username: user.username,
    totpEnabled: user.totpEnabled,
    createdAt: user.createdAt,
  };
}

export function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, { type: argon2.argon2id });
}

/**
 * Admin credentials
 * Password hashing, login checks and TOTP enrolment on top of the user table.
 */
export class AdminCredentials {
  constructor(private readonly users: AdminUserDatabase) {}

  listUsers(): PublicAdminUser[] {
    return this.users.listUsers().map(toPublicUser);
  }

  getUser(username: string): PublicAdminUser | undefined {
    const user = this.users.getUser(username);
    return user ? toPublicUser(user) : undefined;
  }

  async createUser(username: string, password: string): Promise<boolean> {
    const passwordHash = await hashPassword(password);
    return this.users.createUser(username, passwordHash);
  }

  async setPassword(username: string, password: string): Promise<boolean> {
    const passwordHash = await hashPassword(password);
    return this.users.updatePassword(username, passwordHash);
  }

  deleteUser(username: string): boolean {
    return this.users.deleteUser(username);
  }

  /**
   * Creates the first admin when the table is empty. Returns true when a user was added.
   */
  async seedInitialUser(username: string, password: string): Promise<boolean> {
    if (this.users.countUsers() > 0) {
      return false;
    }

    if (!username || password.length < MIN_PASSWORD_LENGTH) {
      logger.warn(
        `No admin users exist. Set ADMIN_USERNAME and ADMIN_PASSWORD (at least ${MIN_PASSWORD_LENGTH} characters) to create one.`
      );
      return false;
    }

    const created = await this.createUser(username, password);
    if (created) {
      logger.info('Seeded initial admin user', { username });
    }
    return created;
  }

  async verifyPassword(username: string, password: string): Promise<boolean> {
    const user = this.users.getUser(username);
    if (!user) {
      return false;
    }

    try {
      return await argon2.verify(user.passwordHash, password);
    } catch (error) {
      logger.error('Password verification failed', {
        username,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async login(username: string, password: string, totpCode?: string): Promise<LoginResult> {
    const user = this.users.getUser(username);
    if (!user || !(await this.verifyPassword(username, password))) {
      return { ok: false, reason: 'INVALID_CREDENTIALS' };
    }

    if (user.totpEnabled) {
      if (!totpCode) {
        return { ok: false, reason: 'TOTP_REQUIRED' };
      }
      if (!authenticator.check(totpCode, user.totpSecret)) {
        return { ok: false, reason: 'INVALID_TOTP' };
      }
    }

    return { ok: true, user: toPublicUser(user) };
  }

  /**
   * Stores a fresh secret for the user. It takes effect once confirmed with verifyTotp().
   */
  async beginTotpSetup(username: string): Promise<TotpEnrollment | undefined> {
    const secret = authenticator.generateSecret();
    if (!this.users.setTotpSecret(username, secret)) {
      return undefined;
    }

    const otpauthUrl = authenticator.keyuri(username, TOTP_ISSUER, secret);
    const qrDataUrl = await QRCode.toDataURL(otpauthUrl);
    return { secret, otpauthUrl, qrDataUrl };
  }

  verifyTotp(username: string, code: string): boolean {
    const user = this.users.getUser(username);
    if (!user || !user.totpSecret) {
      return false;
    }

    if (!authenticator.check(code, user.totpSecret)) {
      return false;
    }

    return this.users.enableTotp(username);
  }

  disableTotp(username: string): boolean {
    return this.users.disableTotp(username);
  }
}
