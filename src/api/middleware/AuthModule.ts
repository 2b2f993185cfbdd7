// API Middleware: Authentication Module
// Resolves the session token on a request into a UserContext

import type { Request, Response, NextFunction } from 'express';
import type { IAuthService } from '@/domain/user/repository.js';
import { SessionError } from '@/domain/user/errors.js';

export const SESSION_COOKIE = 'sessionToken';

/**
 * Extract session token from request (Authorization header or cookie)
 */
export function extractSessionToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    if (token) {
      return token;
    }
  }

  const cookies: Record<string, unknown> = req.cookies ?? {};
  const cookie = cookies[SESSION_COOKIE];
  return typeof cookie === 'string' && cookie ? cookie : undefined;
}

export class AuthModule {
  constructor(readonly authService: IAuthService) {}

  /**
   * Validate the session and attach its context, or fail with 401
   */
  requireSession = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = extractSessionToken(req);
      if (!token) {
        throw new SessionError('INVALID_SESSION');
      }

      req.userContext = await this.authService.validateSession(token);
      req.sessionToken = token;
      next();
    } catch (error) {
      if (error instanceof SessionError) {
        res.clearCookie(SESSION_COOKIE);
      }
      next(error);
    }
  };
}
