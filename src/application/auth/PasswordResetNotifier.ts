// Application: Password reset delivery
// The default notifier only logs; the token itself is printed outside production

import type { PasswordResetNotifier } from '@/domain/user/repository.js';
import { authLogger } from '@/utils/auth-logger.js';

export class LogPasswordResetNotifier implements PasswordResetNotifier {
  async sendResetToken(input: {
    userId: string;
    email: string;
    token: string;
    expiresAt: Date;
  }): Promise<void> {
    authLogger.info('Password reset dispatch requested', {
      userId: input.userId,
      expiresAt: input.expiresAt.toISOString(),
    });

    if (process.env.NODE_ENV === 'development') {
      authLogger.info('Development password reset token preview', {
        email: input.email,
        token: input.token,
      });
    }
  }
}
