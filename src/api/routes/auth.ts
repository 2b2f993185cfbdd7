// API layer: Authentication routes
// Registration, login, logout, profile and password management

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { AuthModule, SESSION_COOKIE, extractSessionToken } from '@/api/middleware/AuthModule.js';
import type { IAuthService } from '@/domain/user/repository.js';
import type { Session, UserContext } from '@/domain/user/types.js';
import { SessionError } from '@/domain/user/errors.js';
import { describeDevice } from '@/utils/device.js';

// Request schemas; format rules live in the service
const RegisterSchema = z.object({
  username: z.string().max(256),
  email: z.string().max(256),
  password: z.string().max(1024),
  fullName: z.string().max(256).optional(),
});

const LoginSchema = z.object({
  identifier: z.string().min(1).max(256),
  password: z.string().max(1024),
  deviceName: z.string().max(128).optional(),
});

const ChangePasswordSchema = z.object({
  oldPassword: z.string().max(1024),
  newPassword: z.string().max(1024),
});

const UpdateProfileSchema = z
  .object({
    fullName: z.string().max(256).optional(),
    email: z.string().max(256).optional(),
    settings: z.record(z.unknown()).optional(),
  })
  .strict();

const ResetRequestSchema = z.object({
  email: z.string().max(256),
});

const ResetConfirmSchema = z.object({
  token: z.string().min(1).max(256),
  newPassword: z.string().max(1024),
});

const ActivityQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

function requireContext(req: Request): UserContext {
  if (!req.userContext) {
    throw new SessionError('INVALID_SESSION');
  }
  return req.userContext;
}

function setSessionCookie(res: Response, session: Session): void {
  res.cookie(SESSION_COOKIE, session.token, {
    httpOnly: true,
    secure: process.env.NODE_ENV === 'production',
    sameSite: 'strict',
    expires: session.expiresAt,
  });
}

export function createAuthRouter(authService: IAuthService): Router {
  const router = Router();
  const auth = new AuthModule(authService);

  /**
   * POST /auth/register
   */
  router.post(
    '/register',
    asyncHandler(async (req: Request, res: Response) => {
      const { username, email, password, fullName } = RegisterSchema.parse(req.body);

      const user = await authService.register(username, email, password, { fullName });

      res.status(201).json({ success: true, user });
    })
  );

  /**
   * POST /auth/login
   */
  router.post(
    '/login',
    asyncHandler(async (req: Request, res: Response) => {
      const { identifier, password, deviceName } = LoginSchema.parse(req.body);

      const session = await authService.login(identifier, password, {
        sourceAddress: req.ip,
        deviceName: deviceName ?? describeDevice(req.headers['user-agent']),
      });

      setSessionCookie(res, session);
      res.json({
        success: true,
        session: {
          token: session.token,
          issuedAt: session.issuedAt,
          expiresAt: session.expiresAt,
        },
      });
    })
  );

  /**
   * POST /auth/logout
   * Succeeds whether or not the token was still valid
   */
  router.post(
    '/logout',
    asyncHandler(async (req: Request, res: Response) => {
      const token = extractSessionToken(req);
      if (token) {
        await authService.logout(token);
      }

      res.clearCookie(SESSION_COOKIE);
      res.json({ success: true });
    })
  );

  /**
   * POST /auth/logout-all
   */
  router.post(
    '/logout-all',
    auth.requireSession,
    asyncHandler(async (req: Request, res: Response) => {
      const context = requireContext(req);
      const revoked = await authService.logoutAll(context.userId);

      res.clearCookie(SESSION_COOKIE);
      res.json({ success: true, revoked });
    })
  );

  /**
   * GET /auth/session
   */
  router.get(
    '/session',
    auth.requireSession,
    asyncHandler(async (req: Request, res: Response) => {
      const context = requireContext(req);
      res.json({
        success: true,
        context: {
          userId: context.userId,
          username: context.username,
          email: context.email,
          fullName: context.fullName,
          expiresAt: context.expiresAt,
        },
      });
    })
  );

  /**
   * GET /auth/me
   */
  router.get(
    '/me',
    auth.requireSession,
    asyncHandler(async (req: Request, res: Response) => {
      const user = await authService.getProfile(requireContext(req).userId);
      res.json({ success: true, user });
    })
  );

  /**
   * PATCH /auth/me
   */
  router.patch(
    '/me',
    auth.requireSession,
    asyncHandler(async (req: Request, res: Response) => {
      const changes = UpdateProfileSchema.parse(req.body);
      const user = await authService.updateProfile(requireContext(req), changes);
      res.json({ success: true, user });
    })
  );

  /**
   * GET /auth/sessions
   */
  router.get(
    '/sessions',
    auth.requireSession,
    asyncHandler(async (req: Request, res: Response) => {
      const sessions = await authService.listSessions(requireContext(req));
      res.json({ success: true, sessions });
    })
  );

  /**
   * GET /auth/activity
   */
  router.get(
    '/activity',
    auth.requireSession,
    asyncHandler(async (req: Request, res: Response) => {
      const { limit } = ActivityQuerySchema.parse(req.query);
      const attempts = await authService.getLoginActivity(requireContext(req), limit);
      res.json({
        success: true,
        attempts: attempts.map((attempt) => ({
          timestamp: attempt.timestamp,
          outcome: attempt.outcome,
          sourceAddress: attempt.sourceAddress ?? null,
        })),
      });
    })
  );

  /**
   * POST /auth/change-password
   */
  router.post(
    '/change-password',
    auth.requireSession,
    asyncHandler(async (req: Request, res: Response) => {
      const { oldPassword, newPassword } = ChangePasswordSchema.parse(req.body);

      await authService.changePassword(requireContext(req).userId, oldPassword, newPassword);

      res.clearCookie(SESSION_COOKIE);
      res.json({ success: true });
    })
  );

  /**
   * POST /auth/password-reset/request
   * Same response for known and unknown addresses
   */
  router.post(
    '/password-reset/request',
    asyncHandler(async (req: Request, res: Response) => {
      const { email } = ResetRequestSchema.parse(req.body);
      await authService.requestPasswordReset(email);
      res.status(202).json({ success: true });
    })
  );

  /**
   * POST /auth/password-reset/confirm
   */
  router.post(
    '/password-reset/confirm',
    asyncHandler(async (req: Request, res: Response) => {
      const { token, newPassword } = ResetConfirmSchema.parse(req.body);
      await authService.resetPassword(token, newPassword);
      res.json({ success: true });
    })
  );

  return router;
}

export default createAuthRouter;
