// Type declarations for Express Request augmentation
import type { UserContext } from '@/domain/user/types.js';

declare global {
  namespace Express {
    interface Request {
      userContext?: UserContext;
      sessionToken?: string;
    }
  }
}

export {};
