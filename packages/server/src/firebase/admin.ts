import { readFileSync } from 'fs';
import { initializeApp, cert, getApps, type App } from 'firebase-admin/app';
import { getAuth, type Auth } from 'firebase-admin/auth';

import { TokenVerifierConfigurationError } from '../tokenVerifier/errors.js';
import type { Logger } from '../types/middleware.js';
import { isRecord } from '../utils/guards.js';

let authInstance: Auth | null = null;
let appInstance: App | null = null;
let emulatorModeInstance = false;

type Environment = Record<string, string | undefined>;

/**
 * Credentials interface for Firebase Admin initialization
 */
interface FirebaseCredentials {
  projectId: string;
  privateKey: string;
  clientEmail: string;
}

/**
 * What a verifier needs to know about the running application
 */
export interface AuthContext {
  projectId: string;
  emulatorMode: boolean;
  auth: Auth;
}

/**
 * Whether the Auth emulator is in use
 * Set by the Firebase CLI when running `firebase emulators:exec`
 */
export function isEmulatorMode(env: Environment = process.env): boolean {
  return Boolean(env.FIREBASE_AUTH_EMULATOR_HOST);
}

/**
 * Project id from the environment, falling back to the service account file
 */
export function resolveProjectId(env: Environment = process.env): string | undefined {
  const fromEnv = env.FIREBASE_PROJECT_ID || env.GOOGLE_CLOUD_PROJECT || env.GCLOUD_PROJECT;
  if (fromEnv) {
    return fromEnv;
  }
  return getCredentialsFromFile(env)?.projectId || undefined;
}

/**
 * Get credentials from environment variables
 */
function getCredentialsFromEnv(env: Environment): FirebaseCredentials | null {
  const projectId = env.FIREBASE_PROJECT_ID;
  const privateKey = env.FIREBASE_PRIVATE_KEY?.replace(/\\n/g, '\n');
  const clientEmail = env.FIREBASE_CLIENT_EMAIL;

  if (!projectId || !privateKey || !clientEmail) {
    return null;
  }

  return { projectId, privateKey, clientEmail };
}

/**
 * Get credentials from service account file
 */
function getCredentialsFromFile(env: Environment): FirebaseCredentials | null {
  const serviceAccountPath = env.GOOGLE_APPLICATION_CREDENTIALS;
  if (!serviceAccountPath) {
    return null;
  }

  let serviceAccount: unknown;
  try {
    serviceAccount = JSON.parse(readFileSync(serviceAccountPath, 'utf-8'));
  } catch (error) {
    throw new TokenVerifierConfigurationError(
      `Failed to load service account file ${serviceAccountPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }

  if (
    !isRecord(serviceAccount) ||
    typeof serviceAccount.project_id !== 'string' ||
    typeof serviceAccount.private_key !== 'string' ||
    typeof serviceAccount.client_email !== 'string'
  ) {
    throw new TokenVerifierConfigurationError(
      `Service account file ${serviceAccountPath} must contain project_id, private_key and client_email`,
    );
  }

  return {
    projectId: serviceAccount.project_id,
    privateKey: serviceAccount.private_key,
    clientEmail: serviceAccount.client_email,
  };
}

/**
 * Initialize Firebase Admin SDK
 * Can be called multiple times safely (idempotent)
 * Against the Auth emulator only a project id is needed
 */
export async function initializeFirebaseAdmin(
  logger?: Logger,
  env: Environment = process.env,
): Promise<void> {
  // Check if already initialized
  const [existing] = getApps();
  if (existing) {
    appInstance = existing;
    authInstance = getAuth(existing);
    emulatorModeInstance = isEmulatorMode(env);
    return;
  }

  if (isEmulatorMode(env)) {
    const projectId = resolveProjectId(env);
    if (!projectId) {
      throw new TokenVerifierConfigurationError(
        'Auth emulator in use but no project id found. Set FIREBASE_PROJECT_ID or GOOGLE_CLOUD_PROJECT.',
      );
    }

    logger?.warn?.('Firebase Admin initialized against the Auth emulator', {
      event: 'firebase_admin_emulator',
      projectId,
      emulatorHost: env.FIREBASE_AUTH_EMULATOR_HOST,
    });

    appInstance = initializeApp({ projectId });
    authInstance = getAuth(appInstance);
    emulatorModeInstance = true;
    return;
  }

  // Environment variables take precedence over file-based credentials
  const envCredentials = getCredentialsFromEnv(env);
  const fileCredentials = getCredentialsFromFile(env);

  if (envCredentials && fileCredentials) {
    logger?.warn?.(
      'Both environment variables and service account file are set. Environment variables will be used.',
      { event: 'firebase_admin_credentials_conflict' },
    );
  }

  const credentials = envCredentials || fileCredentials;

  if (!credentials) {
    throw new TokenVerifierConfigurationError(
      'Firebase Admin credentials not found. Set FIREBASE_PROJECT_ID, FIREBASE_PRIVATE_KEY, and FIREBASE_CLIENT_EMAIL environment variables, or set GOOGLE_APPLICATION_CREDENTIALS to point to a service account file.',
    );
  }

  appInstance = initializeApp({
    credential: cert({
      projectId: credentials.projectId,
      privateKey: credentials.privateKey,
      clientEmail: credentials.clientEmail,
    }),
    projectId: credentials.projectId,
  });
  authInstance = getAuth(appInstance);
  emulatorModeInstance = false;

  logger?.info?.('Firebase Admin initialized', {
    event: 'firebase_admin_initialized',
    projectId: credentials.projectId,
  });
}

/**
 * Get Auth instance
 * Throws if Firebase Admin is not initialized
 */
export function getAuthInstance(): Auth {
  if (!authInstance) {
    throw new Error(
      'Firebase Admin not initialized. Call initializeFirebaseAdmin() first.',
    );
  }
  return authInstance;
}

/**
 * Get Firebase App instance
 * Throws if Firebase Admin is not initialized
 */
export function getAppInstance(): App {
  if (!appInstance) {
    throw new Error(
      'Firebase Admin not initialized. Call initializeFirebaseAdmin() first.',
    );
  }
  return appInstance;
}

/**
 * Project id, emulator mode and Auth instance of the initialized app
 */
export function getAuthContext(): AuthContext {
  const app = getAppInstance();
  const projectId = app.options.projectId;
  if (!projectId) {
    throw new TokenVerifierConfigurationError('Firebase app has no project id');
  }
  return {
    projectId,
    emulatorMode: emulatorModeInstance,
    auth: getAuthInstance(),
  };
}
