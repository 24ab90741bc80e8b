export interface CredentialBundle {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly redirectUri: string;
  readonly mobileNumber: string;
  readonly totpSeed: string;
  readonly mpin: string;
  readonly cachedToken?: string;
  /** Epoch milliseconds. */
  readonly cachedTokenExpiry?: number;
}

export type SessionStatus = 'VALID' | 'EXPIRED' | 'REVOKED' | 'UNINITIALIZED';

export interface Session {
  accessToken: string;
  /** Epoch milliseconds. */
  issuedAt: number;
  /** Epoch milliseconds. */
  expiresAt: number;
  status: SessionStatus;
  refreshToken?: string;
}

export type ManagerState =
  | 'UNINITIALIZED'
  | 'AUTHENTICATING'
  | 'VALID'
  | 'EXPIRING'
  | 'EXPIRED'
  | 'REVOKED';

export interface DriverHandle {
  binaryPath: string;
  version: string;
  browserProfileDir: string;
}

export const LOGIN_STAGES = [
  'START',
  'CREDENTIALS_ENTERED',
  'TOTP_SUBMITTED',
  'CONSENT_CONFIRMED',
  'REDIRECT_CAPTURED',
  'DONE',
] as const;

export type LoginStage = (typeof LOGIN_STAGES)[number];

export interface LoginAttempt {
  attemptNumber: number;
  startedAt: number;
  stageReached: LoginStage;
  lastError: string | null;
}

export type StatusEventType =
  | 'AUTHENTICATING'
  | 'VALID'
  | 'FAILED'
  | 'EXPIRING'
  | 'EXPIRED'
  | 'REVOKED';

export interface SessionStatusEvent {
  type: StatusEventType;
  at: number;
  reason?: string;
  expiresAt?: number;
}

export interface SessionSnapshot {
  state: ManagerState;
  sessionStatus: SessionStatus;
  issuedAt: string | null;
  expiresAt: string | null;
  expiresInSeconds: number | null;
  authenticating: boolean;
  lastError: string | null;
  lastAttempts: LoginAttempt[];
}

export function formatStatusEvent(event: SessionStatusEvent): string {
  if (event.type === 'FAILED') return `FAILED:${event.reason ?? 'unknown'}`;
  return event.type;
}
