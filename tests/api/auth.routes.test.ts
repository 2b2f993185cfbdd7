import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'http';
import { createApp } from '@/api/app.js';
import { authMetrics } from '@/utils/auth-logger.js';
import {
  ControlledAdapter,
  createTestContext,
  OTHER_PASSWORD,
  STRONG_PASSWORD,
  type TestContext,
} from '../helpers.js';

interface ErrorBody {
  success: boolean;
  error: { code: string; message: string; details?: Record<string, unknown> };
}

describe('auth routes', () => {
  let ctx: TestContext;
  let adapter: ControlledAdapter;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    authMetrics.reset();
    adapter = new ControlledAdapter();
    ctx = await createTestContext({ adapter });
    const app = createApp({ authService: ctx.auth, logFormat: null });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function send(method: string, path: string, body?: unknown, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? headers : { 'content-type': 'application/json', ...headers },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  async function errorCode(res: Response): Promise<string> {
    const body = (await res.json()) as ErrorBody;
    return body.error.code;
  }

  async function registerAndLogin(): Promise<string> {
    await send('POST', '/auth/register', {
      username: 'alice',
      email: 'alice@example.com',
      password: STRONG_PASSWORD,
    });
    const res = await send('POST', '/auth/login', { identifier: 'alice', password: STRONG_PASSWORD });
    const body = (await res.json()) as { session: { token: string } };
    return body.session.token;
  }

  function bearer(token: string): Record<string, string> {
    return { authorization: `Bearer ${token}` };
  }

  it('reports health with counters', async () => {
    await registerAndLogin();

    const res = await send('GET', '/health');
    const body = (await res.json()) as { status: string; counters: Record<string, number> };

    expect(res.status).toBe(200);
    expect(body.status).toBe('ok');
    expect(body.counters['auth.login.success']).toBe(1);
  });

  it('registers a user without exposing credentials', async () => {
    const res = await send('POST', '/auth/register', {
      username: 'alice',
      email: 'alice@example.com',
      password: STRONG_PASSWORD,
      fullName: 'Alice',
    });
    const body = (await res.json()) as { success: boolean; user: Record<string, unknown> };

    expect(res.status).toBe(201);
    expect(body.success).toBe(true);
    expect(body.user.username).toBe('alice');
    expect(body.user.fullName).toBe('Alice');
    expect(Object.keys(body.user).sort()).toEqual([
      'createdAt',
      'email',
      'fullName',
      'id',
      'lastLoginAt',
      'settings',
      'username',
    ]);
  });

  it('maps validation, weak password and conflict errors', async () => {
    const missing = await send('POST', '/auth/register', { username: 'alice' });
    expect(missing.status).toBe(400);
    expect(await errorCode(missing)).toBe('INVALID_INPUT');

    const weak = await send('POST', '/auth/register', {
      username: 'alice',
      email: 'alice@example.com',
      password: 'password',
    });
    const weakBody = (await weak.json()) as ErrorBody;
    expect(weak.status).toBe(400);
    expect(weakBody.error).toEqual({
      code: 'WEAK_PASSWORD',
      message: 'Password does not meet the strength requirements',
      details: {
        failedRules: ['PASSWORD_MISSING_UPPERCASE', 'PASSWORD_MISSING_DIGIT', 'PASSWORD_MISSING_SYMBOL'],
      },
    });

    await registerAndLogin();
    const taken = await send('POST', '/auth/register', {
      username: 'ALICE',
      email: 'other@example.com',
      password: STRONG_PASSWORD,
    });
    expect(taken.status).toBe(409);
    expect(await errorCode(taken)).toBe('USERNAME_TAKEN');
  });

  it('rejects malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/auth/login`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"identifier":',
    });

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe('INVALID_INPUT');
  });

  it('rejects bodies over the size limit with 413', async () => {
    const res = await send('POST', '/auth/login', {
      identifier: 'a'.repeat(200 * 1024),
      password: STRONG_PASSWORD,
    });
    const body = (await res.json()) as ErrorBody;

    expect(res.status).toBe(413);
    expect(body.error).toEqual({ code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' });
  });

  it('sets the session cookie on login', async () => {
    await send('POST', '/auth/register', {
      username: 'alice',
      email: 'alice@example.com',
      password: STRONG_PASSWORD,
    });

    const res = await send('POST', '/auth/login', { identifier: 'alice', password: STRONG_PASSWORD });
    const body = (await res.json()) as { session: { token: string; expiresAt: string } };

    expect(res.status).toBe(200);
    expect(body.session.expiresAt).toBe('2026-01-31T00:00:00.000Z');
    const cookie = res.headers.get('set-cookie') ?? '';
    expect(cookie.startsWith(`sessionToken=${body.session.token};`)).toBe(true);
    expect(cookie).toContain('HttpOnly');
  });

  it('authenticates by bearer token or cookie', async () => {
    const token = await registerAndLogin();

    const viaBearer = await send('GET', '/auth/me', undefined, bearer(token));
    const viaCookie = await send('GET', '/auth/session', undefined, { cookie: `sessionToken=${token}` });
    const anonymous = await send('GET', '/auth/me');

    expect(viaBearer.status).toBe(200);
    expect(((await viaBearer.json()) as { user: { email: string } }).user.email).toBe('alice@example.com');
    expect(viaCookie.status).toBe(200);
    expect(((await viaCookie.json()) as { context: { username: string } }).context.username).toBe('alice');
    expect(anonymous.status).toBe(401);
    expect(await errorCode(anonymous)).toBe('INVALID_SESSION');
  });

  it('returns 401 for bad credentials and 429 once locked', async () => {
    await registerAndLogin();

    for (let i = 0; i < 5; i++) {
      const res = await send('POST', '/auth/login', { identifier: 'alice', password: OTHER_PASSWORD });
      expect(res.status).toBe(401);
      expect(await errorCode(res)).toBe('INVALID_CREDENTIALS');
    }

    const locked = await send('POST', '/auth/login', { identifier: 'alice', password: STRONG_PASSWORD });
    expect(locked.status).toBe(429);
    expect(await errorCode(locked)).toBe('ACCOUNT_LOCKED');
  });

  it('logs out and rejects the revoked token', async () => {
    const token = await registerAndLogin();

    const logout = await send('POST', '/auth/logout', undefined, bearer(token));
    expect(logout.status).toBe(200);

    const after = await send('GET', '/auth/session', undefined, bearer(token));
    expect(after.status).toBe(401);
    expect(await errorCode(after)).toBe('REVOKED_SESSION');

    const again = await send('POST', '/auth/logout', undefined, bearer(token));
    expect(again.status).toBe(200);
  });

  it('updates the profile and lists sessions', async () => {
    const token = await registerAndLogin();

    const patch = await send('PATCH', '/auth/me', { fullName: 'Alice Liddell', settings: { theme: 'dark' } }, bearer(token));
    const patched = (await patch.json()) as { user: { fullName: string; settings: Record<string, unknown> } };
    expect(patch.status).toBe(200);
    expect(patched.user.fullName).toBe('Alice Liddell');
    expect(patched.user.settings).toEqual({ theme: 'dark' });

    const unknownField = await send('PATCH', '/auth/me', { isAdmin: true }, bearer(token));
    expect(unknownField.status).toBe(400);

    const list = await send('GET', '/auth/sessions', undefined, bearer(token));
    const { sessions } = (await list.json()) as { sessions: Array<{ tokenHint: string; isCurrent: boolean }> };
    expect(sessions).toHaveLength(1);
    expect(sessions[0].isCurrent).toBe(true);
    expect(sessions[0].tokenHint).toBe(token.slice(-6));
  });

  it('shows login activity', async () => {
    const token = await registerAndLogin();

    const res = await send('GET', '/auth/activity?limit=5', undefined, bearer(token));
    const body = (await res.json()) as { attempts: Array<{ outcome: string }> };

    expect(res.status).toBe(200);
    expect(body.attempts.map((a) => a.outcome)).toEqual(['success']);
  });

  it('changes the password and ends every session', async () => {
    const token = await registerAndLogin();

    const res = await send(
      'POST',
      '/auth/change-password',
      { oldPassword: STRONG_PASSWORD, newPassword: OTHER_PASSWORD },
      bearer(token)
    );
    expect(res.status).toBe(200);

    const after = await send('GET', '/auth/me', undefined, bearer(token));
    expect(after.status).toBe(401);
  });

  it('revokes all sessions', async () => {
    const token = await registerAndLogin();
    await send('POST', '/auth/login', { identifier: 'alice', password: STRONG_PASSWORD });

    const res = await send('POST', '/auth/logout-all', undefined, bearer(token));

    expect(res.status).toBe(200);
    expect(((await res.json()) as { revoked: number }).revoked).toBe(2);
  });

  it('runs the password reset flow', async () => {
    await registerAndLogin();

    const unknown = await send('POST', '/auth/password-reset/request', { email: 'nobody@example.com' });
    expect(unknown.status).toBe(202);

    const request = await send('POST', '/auth/password-reset/request', { email: 'alice@example.com' });
    expect(request.status).toBe(202);
    const { token } = ctx.notifier.sent[0];

    const confirm = await send('POST', '/auth/password-reset/confirm', { token, newPassword: OTHER_PASSWORD });
    expect(confirm.status).toBe(200);

    const reused = await send('POST', '/auth/password-reset/confirm', { token, newPassword: STRONG_PASSWORD });
    expect(reused.status).toBe(400);
    expect(await errorCode(reused)).toBe('INVALID_RESET_TOKEN');
  });

  it('answers 503 with Retry-After when storage fails', async () => {
    adapter.failWrites = true;

    const res = await send('POST', '/auth/register', {
      username: 'alice',
      email: 'alice@example.com',
      password: STRONG_PASSWORD,
    });

    expect(res.status).toBe(503);
    expect(res.headers.get('retry-after')).toBe('5');
    expect(await errorCode(res)).toBe('UNAVAILABLE');
  });

  it('returns 404 for unknown routes', async () => {
    const res = await send('GET', '/nope');
    expect(res.status).toBe(404);
    expect(await errorCode(res)).toBe('NOT_FOUND');
  });
});
