import type { Request } from 'express';
import type { Logger } from './middleware.js';
import type { VerifiedToken } from '../tokenVerifier/verifiedToken.js';

declare global {
  namespace Express {
    export interface Request {
      user?: { sub: string; email?: string; name?: string };
      token?: VerifiedToken;
      correlationId?: string;
      logger?: Logger;
    }
  }
}
