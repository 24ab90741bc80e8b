import type { LoginStage } from './types.js';

export class SessionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SessionError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
}

/** Missing or malformed credentials. Needs an operator fix, never retried. */
export class ConfigError extends SessionError {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[] = [],
  ) {
    super(message, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
  }

  static fromZodIssues(
    issues: Array<{ path: Array<string | number>; message: string }>,
  ): ConfigError {
    const mapped = issues.map((issue) => ({
      field: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    const fields = [...new Set(mapped.map((i) => i.field))].join(', ');
    return new ConfigError(`Invalid credentials: ${fields}`, mapped);
  }
}

export type ProvisioningFailure =
  | 'NETWORK'
  | 'NO_MATCHING_BUILD'
  | 'CHECKSUM_MISMATCH'
  | 'INSTALL_FAILED'
  | 'BROWSER_NOT_FOUND';

/** A missing browser needs an operator; every other failure may clear on a later download. */
const FATAL_PROVISIONING: ReadonlySet<ProvisioningFailure> = new Set(['BROWSER_NOT_FOUND']);

export class ProvisioningError extends SessionError {
  constructor(
    message: string,
    public readonly failure: ProvisioningFailure,
    options?: { cause?: unknown },
  ) {
    super(message, 'PROVISIONING_ERROR', !FATAL_PROVISIONING.has(failure), options);
    this.name = 'ProvisioningError';
  }
}

export class LoginFlowError extends SessionError {
  constructor(
    public readonly stage: LoginStage,
    public readonly detail: string,
    public readonly lockout = false,
  ) {
    super(`Login failed at ${stage}: ${detail}`, 'LOGIN_FLOW_ERROR', !lockout);
    this.name = 'LoginFlowError';
  }

  static lockedOut(stage: LoginStage): LoginFlowError {
    return new LoginFlowError(stage, 'lockout or captcha detected', true);
  }

  static timedOut(stage: LoginStage, ms: number): LoginFlowError {
    return new LoginFlowError(stage, `timed out after ${ms}ms`);
  }
}

/** Token exchange rejected. The authorization code is spent, so only a fresh login recovers. */
export class ExchangeError extends SessionError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, 'EXCHANGE_ERROR', true, options);
    this.name = 'ExchangeError';
  }

  static fromResponse(statusCode: number, body: unknown): ExchangeError {
    return new ExchangeError(
      `Token exchange failed (${statusCode}): ${extractBrokerMessage(body)}`,
      statusCode,
    );
  }
}

export interface AttemptSummary {
  attemptNumber: number;
  stageReached: LoginStage;
  error: string;
}

export class AuthenticationError extends SessionError {
  constructor(
    message: string,
    public readonly attempts: AttemptSummary[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, 'AUTHENTICATION_ERROR', false, options);
    this.name = 'AuthenticationError';
  }

  static wrap(err: unknown): AuthenticationError {
    if (err instanceof AuthenticationError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new AuthenticationError(`Authentication failed: ${message}`, [], { cause: err });
  }
}

export function extractBrokerMessage(body: unknown): string {
  if (body && typeof body === 'object') {
    if ('errors' in body && Array.isArray(body.errors) && body.errors.length > 0) {
      const first: unknown = body.errors[0];
      if (first && typeof first === 'object' && 'message' in first) {
        return String(first.message);
      }
    }
    if ('message' in body && typeof body.message === 'string') {
      return body.message;
    }
  }
  return 'request failed';
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  retryable?: boolean;
  stage?: LoginStage;
  statusCode?: number;
  issues?: ConfigIssue[];
  attempts?: AttemptSummary[];
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof SessionError) {
    const out: SerializedError = {
      name: err.name,
      message: err.message,
      code: err.code,
      retryable: err.retryable,
    };
    if (err instanceof LoginFlowError) out.stage = err.stage;
    if (err instanceof ExchangeError && err.statusCode !== undefined) {
      out.statusCode = err.statusCode;
    }
    if (err instanceof ConfigError && err.issues.length > 0) out.issues = err.issues;
    if (err instanceof AuthenticationError && err.attempts.length > 0) {
      out.attempts = err.attempts;
    }
    return out;
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'UnknownError', message: String(err) };
}
