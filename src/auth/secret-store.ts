import { existsSync, readFileSync, statSync } from 'node:fs';
import { z } from 'zod';
import { maskValue } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from './errors.js';
import { isValidBase32, normalizeBase32 } from './totp.js';
import type { CredentialBundle } from './types.js';

const log = createLogger('secret-store');

const ENV_KEYS = {
  api_key: 'UPSTOX_API_KEY',
  api_secret: 'UPSTOX_API_SECRET',
  redirect_uri: 'UPSTOX_REDIRECT_URI',
  mobile_number: 'UPSTOX_MOBILE_NUMBER',
  totp_seed: 'UPSTOX_TOTP_SECRET',
  mpin: 'UPSTOX_MPIN',
  cached_token: 'UPSTOX_ACCESS_TOKEN',
  cached_token_expiry: 'UPSTOX_ACCESS_TOKEN_EXPIRY',
} as const;

const requiredString = (label: string) =>
  z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`);

const expirySchema = z.union([z.number(), z.string()]).transform((raw, ctx) => {
  const ms = typeof raw === 'number' || /^\d+$/.test(raw) ? Number(raw) : Date.parse(raw);
  if (!Number.isFinite(ms)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be ISO-8601 or epoch ms' });
    return z.NEVER;
  }
  return ms;
});

export const credentialsSchema = z
  .object({
    api_key: requiredString('API key'),
    api_secret: requiredString('API secret'),
    redirect_uri: requiredString('Redirect URI')
      .url('Must be a URL')
      .refine((uri) => uri.startsWith('https://'), 'Must use https'),
    mobile_number: requiredString('Mobile number').regex(/^\d{10}$/, 'Must be 10 digits'),
    totp_seed: requiredString('TOTP seed').refine(isValidBase32, 'Must be base32'),
    mpin: requiredString('MPIN').regex(/^\d{4,6}$/, 'Must be 4-6 digits'),
    cached_token: z.string().trim().min(1).optional(),
    cached_token_expiry: expirySchema.optional(),
  })
  .refine((c) => c.cached_token === undefined || c.cached_token_expiry !== undefined, {
    message: 'Required when cached_token is set',
    path: ['cached_token_expiry'],
  });

export interface SecretStoreOptions {
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}

export class SecretStore {
  private filePath: string | undefined;
  private env: NodeJS.ProcessEnv;

  constructor(opts: SecretStoreOptions = {}) {
    this.filePath = opts.filePath;
    this.env = opts.env ?? process.env;
  }

  load(): CredentialBundle {
    const raw: Record<string, unknown> = { ...this.readFile() };

    for (const [field, envName] of Object.entries(ENV_KEYS)) {
      const value = this.env[envName];
      if (value !== undefined && value.trim() !== '') {
        raw[field] = value;
      }
    }

    const parsed = credentialsSchema.safeParse(raw);
    if (!parsed.success) {
      const err = ConfigError.fromZodIssues(parsed.error.issues);
      log.error({ fields: err.issues.map((i) => i.field) }, 'Credential bundle rejected');
      throw err;
    }

    const c = parsed.data;
    const bundle: CredentialBundle = Object.freeze({
      apiKey: c.api_key,
      apiSecret: c.api_secret,
      redirectUri: c.redirect_uri,
      mobileNumber: c.mobile_number,
      totpSeed: normalizeBase32(c.totp_seed),
      mpin: c.mpin,
      ...(c.cached_token !== undefined && c.cached_token_expiry !== undefined
        ? { cachedToken: c.cached_token, cachedTokenExpiry: c.cached_token_expiry }
        : {}),
    });

    log.debug(describeBundle(bundle), 'Credential bundle loaded');
    return bundle;
  }

  private readFile(): Record<string, unknown> {
    if (!this.filePath || !existsSync(this.filePath)) {
      if (this.filePath) log.debug({ path: this.filePath }, 'Credentials file not found');
      return {};
    }

    // Group/other bits on the secrets file
    const mode = statSync(this.filePath).mode;
    if (process.platform !== 'win32' && (mode & 0o077) !== 0) {
      log.warn(
        { path: this.filePath, mode: (mode & 0o777).toString(8) },
        'Credentials file is readable by other users',
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf8'));
    } catch {
      throw new ConfigError(`Credentials file is not valid JSON: ${this.filePath}`);
    }
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigError(`Credentials file must contain a JSON object: ${this.filePath}`);
    }
    return { ...parsed };
  }
}

/** Log-safe view of a bundle. */
export function describeBundle(bundle: CredentialBundle): Record<string, unknown> {
  return {
    apiKeyHint: maskValue(bundle.apiKey),
    redirectUri: bundle.redirectUri,
    mobileHint: maskValue(bundle.mobileNumber, 2),
    hasCachedToken: bundle.cachedToken !== undefined,
    cachedTokenExpiry:
      bundle.cachedTokenExpiry !== undefined
        ? new Date(bundle.cachedTokenExpiry).toISOString()
        : null,
  };
}
