import { isRecord } from '../utils/guards.js';

/**
 * Claims that passed every check
 */
export interface ValidatedClaims {
  issuer: string;
  audience: string;
  subject: string;
  issuedAt: number;
  expiresAt: number;
  tenantId?: string;
  claims: Readonly<Record<string, unknown>>;
}

/**
 * A verified ID token or session cookie
 * Returned by FirebaseTokenVerifier.verify(). Immutable: the claim map is a
 * deep-frozen copy of the token payload.
 */
export class VerifiedToken {
  readonly issuer: string;
  readonly audience: string;
  readonly subject: string;
  /**
   * Seconds since the epoch
   */
  readonly issuedAt: number;
  /**
   * Seconds since the epoch
   */
  readonly expiresAt: number;
  readonly tenantId?: string;
  readonly claims: Readonly<Record<string, unknown>>;

  constructor(validated: ValidatedClaims) {
    this.issuer = validated.issuer;
    this.audience = validated.audience;
    this.subject = validated.subject;
    this.issuedAt = validated.issuedAt;
    this.expiresAt = validated.expiresAt;
    this.tenantId = validated.tenantId;
    this.claims = deepFreeze(structuredClone(validated.claims));
    Object.freeze(this);
  }

  /** The user's uid; alias of subject */
  get uid(): string {
    return this.subject;
  }

  get email(): string | undefined {
    return stringClaim(this.claims.email);
  }

  get emailVerified(): boolean {
    return this.claims.email_verified === true;
  }

  get name(): string | undefined {
    return stringClaim(this.claims.name);
  }

  get picture(): string | undefined {
    return stringClaim(this.claims.picture);
  }

  /** Seconds since the epoch at which the user last signed in */
  get authTime(): number | undefined {
    const authTime = this.claims.auth_time;
    return typeof authTime === 'number' ? authTime : undefined;
  }

  get signInProvider(): string | undefined {
    const firebase = this.claims.firebase;
    return isRecord(firebase) ? stringClaim(firebase.sign_in_provider) : undefined;
  }

  toJSON(): Readonly<Record<string, unknown>> {
    return this.claims;
  }
}

function stringClaim(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
