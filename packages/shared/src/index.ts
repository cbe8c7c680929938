// Types
export type {
  ErrorResponse,
  ErrorCode,
  VerificationErrorKind,
  AuthErrorCode,
  Clock,
} from './types.js';

// Constants
export {
  ERROR_CODES,
  VERIFICATION_ERROR_KINDS,
  AUTH_ERROR_CODES,
  ALGORITHMS,
  ENDPOINTS,
  DEFAULTS,
} from './constants.js';

// Clock
export { systemClock } from './clock.js';
