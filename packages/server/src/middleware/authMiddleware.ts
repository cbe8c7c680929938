import type { Request, Response, NextFunction, RequestHandler } from 'express';

import { DEFAULTS, ERROR_CODES, VERIFICATION_ERROR_KINDS } from '@credcheck/shared';
import type { ErrorCode, ErrorResponse, VerificationErrorKind } from '@credcheck/shared';

import type { UserTokenVerifier, UserTokenVerificationError, Logger } from '../types/middleware.js';
import { isRecord } from '../utils/guards.js';

export interface AuthMiddlewareOptions {
  /**
   * Where the credential is read from
   * - bearer: `Authorization: Bearer <ID token>` (default)
   * - cookie: a session cookie; needs cookie-parser mounted upstream
   */
  source?: 'bearer' | 'cookie';

  /**
   * Cookie read when source is 'cookie', defaults to DEFAULTS.SESSION_COOKIE_NAME
   */
  cookieName?: string;

  logger?: Logger;
}

const KNOWN_KINDS: ReadonlySet<string> = new Set(Object.values(VERIFICATION_ERROR_KINDS));

function isVerificationErrorKind(value: unknown): value is VerificationErrorKind {
  return typeof value === 'string' && KNOWN_KINDS.has(value);
}

/**
 * Type guard for errors raised by a token verifier
 */
function isUserTokenVerificationError(error: unknown): error is UserTokenVerificationError {
  if (!(error instanceof Error)) {
    return false;
  }
  const kind = 'kind' in error ? error.kind : undefined;
  const isExpired = 'isExpired' in error ? error.isExpired : undefined;
  return isVerificationErrorKind(kind) || isExpired === true;
}

function sendError(
  res: Response,
  status: number,
  code: ErrorCode,
  message: string,
  requiresReauthentication: boolean,
  kind?: VerificationErrorKind,
): void {
  const body: ErrorResponse = {
    error: {
      code,
      kind,
      message,
      requiresReauthentication,
      timestamp: new Date().toISOString(),
    },
  };
  res.status(status).json(body);
}

/**
 * Create authentication middleware
 * Verifies the request's ID token or session cookie and attaches the result
 * as req.user and req.token
 */
export function createAuthMiddleware(
  userTokenVerifier: UserTokenVerifier,
  options: AuthMiddlewareOptions = {},
): RequestHandler {
  const source = options.source ?? 'bearer';
  const cookieName = options.cookieName ?? DEFAULTS.SESSION_COOKIE_NAME;

  return async (req: Request, res: Response, next: NextFunction) => {
    // Type-safe access with Express type extensions
    const requestLogger: Logger | undefined = req.logger || options.logger;
    const correlationId = req.correlationId;

    const credential = source === 'cookie' ? readCookie(req, cookieName) : readBearerToken(req);
    if (!credential) {
      sendError(
        res,
        401,
        ERROR_CODES.AUTH_FAILED,
        source === 'cookie' ? 'Session cookie required' : 'Authorization header required',
        false,
      );
      return;
    }

    try {
      const token = await userTokenVerifier.verify(credential, correlationId);

      req.user = { sub: token.uid, email: token.email, name: token.name };
      req.token = token;
      next();
    } catch (error: unknown) {
      if (!isUserTokenVerificationError(error)) {
        requestLogger?.error?.('Authentication middleware error', {
          event: 'auth_middleware_error',
          error: {
            name: error instanceof Error ? error.name : 'Unknown',
            message: error instanceof Error ? error.message : 'Unknown error',
          },
          correlationId,
        });
        next(error);
        return;
      }

      const kind = error.kind;

      if (kind === VERIFICATION_ERROR_KINDS.KEY_FETCH_FAILED) {
        requestLogger?.error?.('Signing keys unavailable', {
          event: 'auth_keys_unavailable',
          error: error.message,
          correlationId,
        });
        sendError(
          res,
          503,
          ERROR_CODES.SERVICE_UNAVAILABLE,
          'Credentials could not be verified at this time',
          false,
          kind,
        );
        return;
      }

      requestLogger?.warn?.('Token verification failed', {
        event: 'auth_token_rejected',
        kind,
        error: error.message,
        correlationId,
      });

      if (kind === VERIFICATION_ERROR_KINDS.TOKEN_EXPIRED || error.isExpired === true) {
        sendError(res, 401, ERROR_CODES.TOKEN_EXPIRED, error.message, true, kind);
        return;
      }

      if (
        kind === VERIFICATION_ERROR_KINDS.TOKEN_REVOKED ||
        kind === VERIFICATION_ERROR_KINDS.USER_DISABLED
      ) {
        sendError(res, 401, ERROR_CODES.TOKEN_REVOKED, error.message, true, kind);
        return;
      }

      sendError(res, 401, ERROR_CODES.AUTH_FAILED, error.message, false, kind);
    }
  };
}

function readBearerToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    return undefined;
  }
  return authHeader.slice('Bearer '.length).trim() || undefined;
}

function readCookie(req: Request, cookieName: string): string | undefined {
  // Populated by cookie-parser
  const cookies: unknown = req.cookies;
  if (!isRecord(cookies)) {
    return undefined;
  }
  const value = cookies[cookieName];
  return typeof value === 'string' && value !== '' ? value : undefined;
}
