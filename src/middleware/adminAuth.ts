import { Request, Response, NextFunction } from 'express';
import { AppError } from './errorHandler';
import type { AdminCredentials } from '../services/adminCredentials';
import { logger } from '../utils/logger';

/**
 * Rejects every admin route while the panel is switched off
 */
export function requireAdminEnabled(enabled: boolean) {
  return (_req: Request, _res: Response, next: NextFunction) => {
    if (!enabled) {
      throw new AppError('Admin panel is disabled', 403, 'ADMIN_DISABLED');
    }
    next();
  };
}

/**
 * Requires a session whose admin user still exists. Sessions left behind by a
 * deleted account are destroyed.
 */
export function requireAdmin(credentials: Pick<AdminCredentials, 'getUser'>) {
  return async (req: Request, _res: Response, next: NextFunction) => {
    const username = req.session.adminUser;
    if (!username) {
      throw new AppError('Admin login required', 401, 'UNAUTHORIZED');
    }

    if (!credentials.getUser(username)) {
      logger.warn('Admin session refers to a removed user', { username });
      await destroySession(req);
      throw new AppError('Admin login required', 401, 'UNAUTHORIZED');
    }

    next();
  };
}

export function currentAdmin(req: Request): string {
  const username = req.session.adminUser;
  if (!username) {
    throw new AppError('Admin login required', 401, 'UNAUTHORIZED');
  }
  return username;
}

/**
 * Issues a fresh session id, carrying the gateway unlock records over.
 */
export function regenerateSession(req: Request): Promise<void> {
  const unlockedServers = req.session.unlockedServers;
  return new Promise((resolve, reject) => {
    req.session.regenerate((error: unknown) => {
      if (error) {
        reject(error);
        return;
      }
      if (unlockedServers) {
        req.session.unlockedServers = unlockedServers;
      }
      resolve();
    });
  });
}

function destroySession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy((error: unknown) => (error ? reject(error) : resolve()));
  });
}
