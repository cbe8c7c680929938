import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import { AUTH_ERROR_CODES, ERROR_CODES, VERIFICATION_ERROR_KINDS } from '@credcheck/shared';
import { createAuthMiddleware } from './authMiddleware.js';
import { TokenVerificationError } from '../tokenVerifier/errors.js';
import { VerifiedToken } from '../tokenVerifier/verifiedToken.js';
import type { UserTokenVerifier, Logger } from '../types/middleware.js';

function verifiedToken(claims: Record<string, unknown> = {}): VerifiedToken {
  return new VerifiedToken({
    issuer: 'https://securetoken.google.com/proj-1',
    audience: 'proj-1',
    subject: 'user-123',
    issuedAt: 1_700_000_000,
    expiresAt: 1_700_003_600,
    claims: { sub: 'user-123', email: 'test@example.com', name: 'Test User', ...claims },
  });
}

describe('createAuthMiddleware', () => {
  let authMiddleware: ReturnType<typeof createAuthMiddleware>;
  let mockUserTokenVerifier: UserTokenVerifier;
  let mockLogger: Logger;
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let mockNext: NextFunction;

  beforeEach(() => {
    vi.clearAllMocks();

    mockUserTokenVerifier = {
      verify: vi.fn(),
    };

    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    mockRequest = {
      headers: {},
      correlationId: 'test-correlation-id',
    };

    mockResponse = {
      status: vi.fn().mockReturnThis(),
      json: vi.fn().mockReturnThis(),
    };

    mockNext = vi.fn() as unknown as NextFunction;

    authMiddleware = createAuthMiddleware(mockUserTokenVerifier, { logger: mockLogger });
  });

  describe('Authorization Header Validation', () => {
    it('should return 401 when authorization header is missing', async () => {
      mockRequest.headers = {};

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: ERROR_CODES.AUTH_FAILED,
          message: 'Authorization header required',
          requiresReauthentication: false,
          timestamp: expect.any(String),
        },
      });
      expect(mockUserTokenVerifier.verify).not.toHaveBeenCalled();
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should return 401 when authorization header does not start with "Bearer "', async () => {
      mockRequest.headers = {
        authorization: 'Basic dXNlcjpwYXNz',
      };

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(mockUserTokenVerifier.verify).not.toHaveBeenCalled();
    });

    it('should return 401 when the bearer token is empty', async () => {
      mockRequest.headers = {
        authorization: 'Bearer   ',
      };

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(mockUserTokenVerifier.verify).not.toHaveBeenCalled();
    });
  });

  describe('Token Verification', () => {
    beforeEach(() => {
      mockRequest.headers = {
        authorization: 'Bearer valid-token',
      };
    });

    it('should attach user and token to request and call next() when token is valid', async () => {
      const token = verifiedToken();
      vi.mocked(mockUserTokenVerifier.verify).mockResolvedValue(token);

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockRequest.user).toEqual({
        sub: 'user-123',
        email: 'test@example.com',
        name: 'Test User',
      });
      expect(mockRequest.token).toBe(token);
      expect(mockNext).toHaveBeenCalledWith();
      expect(mockResponse.status).not.toHaveBeenCalled();
    });

    it('should pass token and correlationId to token verifier', async () => {
      vi.mocked(mockUserTokenVerifier.verify).mockResolvedValue(verifiedToken());

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockUserTokenVerifier.verify).toHaveBeenCalledWith('valid-token', 'test-correlation-id');
    });

    it('should return 401 with AUTH_FAILED when the signature is invalid', async () => {
      vi.mocked(mockUserTokenVerifier.verify).mockRejectedValue(
        new TokenVerificationError(
          VERIFICATION_ERROR_KINDS.INVALID_SIGNATURE,
          AUTH_ERROR_CODES.INVALID_ID_TOKEN,
          'Failed to verify the signature of Firebase ID token.',
        ),
      );

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: ERROR_CODES.AUTH_FAILED,
          kind: VERIFICATION_ERROR_KINDS.INVALID_SIGNATURE,
          message: 'Failed to verify the signature of Firebase ID token.',
          requiresReauthentication: false,
          timestamp: expect.any(String),
        },
      });
      expect(mockLogger.warn).toHaveBeenCalledWith('Token verification failed', {
        event: 'auth_token_rejected',
        kind: VERIFICATION_ERROR_KINDS.INVALID_SIGNATURE,
        error: 'Failed to verify the signature of Firebase ID token.',
        correlationId: 'test-correlation-id',
      });
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should return 401 with TOKEN_EXPIRED when token is expired', async () => {
      vi.mocked(mockUserTokenVerifier.verify).mockRejectedValue(
        new TokenVerificationError(
          VERIFICATION_ERROR_KINDS.TOKEN_EXPIRED,
          AUTH_ERROR_CODES.EXPIRED_ID_TOKEN,
          'Firebase ID token has expired.',
        ),
      );

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: ERROR_CODES.TOKEN_EXPIRED,
          kind: VERIFICATION_ERROR_KINDS.TOKEN_EXPIRED,
          message: 'Firebase ID token has expired.',
          requiresReauthentication: true,
          timestamp: expect.any(String),
        },
      });
    });

    it('should honour isExpired from other verifier implementations', async () => {
      const error = Object.assign(new Error('jwt expired'), { isExpired: true });
      vi.mocked(mockUserTokenVerifier.verify).mockRejectedValue(error);

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: ERROR_CODES.TOKEN_EXPIRED,
          message: 'jwt expired',
          requiresReauthentication: true,
          timestamp: expect.any(String),
        },
      });
    });

    it.each([VERIFICATION_ERROR_KINDS.TOKEN_REVOKED, VERIFICATION_ERROR_KINDS.USER_DISABLED])(
      'should return 401 with TOKEN_REVOKED for %s',
      async (kind) => {
        vi.mocked(mockUserTokenVerifier.verify).mockRejectedValue(
          new TokenVerificationError(kind, AUTH_ERROR_CODES.REVOKED_ID_TOKEN, 'Firebase ID token is revoked.'),
        );

        await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

        expect(mockResponse.status).toHaveBeenCalledWith(401);
        expect(mockResponse.json).toHaveBeenCalledWith({
          error: {
            code: ERROR_CODES.TOKEN_REVOKED,
            kind,
            message: 'Firebase ID token is revoked.',
            requiresReauthentication: true,
            timestamp: expect.any(String),
          },
        });
      },
    );

    it('should return 503 with SERVICE_UNAVAILABLE when signing keys cannot be fetched', async () => {
      vi.mocked(mockUserTokenVerifier.verify).mockRejectedValue(
        new TokenVerificationError(
          VERIFICATION_ERROR_KINDS.KEY_FETCH_FAILED,
          AUTH_ERROR_CODES.CERTIFICATE_FETCH_FAILED,
          'Error while fetching public key certificates: connect ETIMEDOUT',
        ),
      );

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockResponse.status).toHaveBeenCalledWith(503);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: ERROR_CODES.SERVICE_UNAVAILABLE,
          kind: VERIFICATION_ERROR_KINDS.KEY_FETCH_FAILED,
          message: 'Credentials could not be verified at this time',
          requiresReauthentication: false,
          timestamp: expect.any(String),
        },
      });
      expect(mockLogger.error).toHaveBeenCalledWith('Signing keys unavailable', {
        event: 'auth_keys_unavailable',
        error: 'Error while fetching public key certificates: connect ETIMEDOUT',
        correlationId: 'test-correlation-id',
      });
    });

    it('should pass unexpected errors to next()', async () => {
      const error = new Error('user lookup failed');
      vi.mocked(mockUserTokenVerifier.verify).mockRejectedValue(error);

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockNext).toHaveBeenCalledWith(error);
      expect(mockResponse.status).not.toHaveBeenCalled();
      expect(mockLogger.error).toHaveBeenCalledWith('Authentication middleware error', {
        event: 'auth_middleware_error',
        error: { name: 'Error', message: 'user lookup failed' },
        correlationId: 'test-correlation-id',
      });
    });

    it('should use request logger when available, fallback to provided logger', async () => {
      const requestLogger: Logger = { warn: vi.fn() };
      mockRequest.logger = requestLogger;
      vi.mocked(mockUserTokenVerifier.verify).mockRejectedValue(
        new TokenVerificationError(
          VERIFICATION_ERROR_KINDS.MALFORMED_TOKEN,
          AUTH_ERROR_CODES.INVALID_ID_TOKEN,
          'Failed to parse Firebase ID token.',
        ),
      );

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(requestLogger.warn).toHaveBeenCalled();
      expect(mockLogger.warn).not.toHaveBeenCalled();
    });
  });

  describe('Session Cookie Source', () => {
    beforeEach(() => {
      authMiddleware = createAuthMiddleware(mockUserTokenVerifier, {
        source: 'cookie',
        logger: mockLogger,
      });
    });

    it('should verify the session cookie', async () => {
      mockRequest.cookies = { session: 'cookie-value' };
      vi.mocked(mockUserTokenVerifier.verify).mockResolvedValue(verifiedToken());

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockUserTokenVerifier.verify).toHaveBeenCalledWith('cookie-value', 'test-correlation-id');
      expect(mockNext).toHaveBeenCalledWith();
    });

    it('should ignore the authorization header', async () => {
      mockRequest.headers = { authorization: 'Bearer valid-token' };

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: ERROR_CODES.AUTH_FAILED,
          message: 'Session cookie required',
          requiresReauthentication: false,
          timestamp: expect.any(String),
        },
      });
    });

    it('should read a custom cookie name', async () => {
      authMiddleware = createAuthMiddleware(mockUserTokenVerifier, {
        source: 'cookie',
        cookieName: '__session',
      });
      mockRequest.cookies = { __session: 'cookie-value', session: 'other' };
      vi.mocked(mockUserTokenVerifier.verify).mockResolvedValue(verifiedToken());

      await authMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockUserTokenVerifier.verify).toHaveBeenCalledWith('cookie-value', 'test-correlation-id');
    });
  });
});
