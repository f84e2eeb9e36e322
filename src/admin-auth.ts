import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import logger from './logger';

export const ADMIN_KEY_HEADER = 'x-admin-key';

export interface AdminAuthConfig {
  adminApiKey: string | null;
  debug: boolean;
}

const digest = (value: string) => createHash('sha256').update(value).digest();

export const getAdminKeyFromRequest = (req: Pick<Request, 'header'>): string | null => {
  const headerKey = req.header(ADMIN_KEY_HEADER);
  if (headerKey) {
    return headerKey.trim();
  }
  const authHeader = req.header('authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.slice(7).trim();
  }
  return null;
};

/**
 * A static shared key. Without a configured key the admin API is closed,
 * except in debug mode where it is open for local work.
 */
export const isAdminKeyValid = (config: AdminAuthConfig, provided: string | null): boolean => {
  if (!config.adminApiKey) {
    return config.debug;
  }
  if (!provided) {
    return false;
  }
  return timingSafeEqual(digest(provided), digest(config.adminApiKey));
};

export const requireAdminKey =
  (config: AdminAuthConfig) => (req: Request, res: Response, next: NextFunction) => {
    if (!isAdminKeyValid(config, getAdminKeyFromRequest(req))) {
      logger.warn(`[ADMIN] Rejected ${req.method} ${req.path}`);
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
