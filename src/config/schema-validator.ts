import { z } from 'zod';

const timeRegex = /^\d{2}:\d{2}$/;

const regexString = z.string().refine((pattern) => {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}, 'Must be a valid regular expression');

// ── Credentials ──────────────────────────────────────────────────────────────
const authSchemas = new Map<string, z.ZodType>([['auth.credentialsFile', z.string().min(1)]]);

// ── Broker ───────────────────────────────────────────────────────────────────
const brokerSchemas = new Map<string, z.ZodType>([
  ['broker.authorizeUrl', z.string().url()],
  ['broker.tokenUrl', z.string().url()],
  ['broker.apiBaseUrl', z.string().url()],
  ['broker.refreshSupported', z.boolean()],
  ['broker.requestTimeoutMs', z.number().int().min(1000).max(120_000)],
]);

// ── Login ────────────────────────────────────────────────────────────────────
const loginSchemas = new Map<string, z.ZodType>([
  ['login.mode', z.enum(['automated', 'manual'])],
  ['login.maxAttempts', z.number().int().min(1).max(10)],
  ['login.backoffBaseMs', z.number().int().min(0).max(300_000)],
  ['login.backoffMaxMs', z.number().int().min(0).max(600_000)],
  ['login.stageTimeoutMs', z.number().int().min(1000).max(300_000)],
  ['login.actionDelayMinMs', z.number().int().min(0).max(10_000)],
  ['login.actionDelayMaxMs', z.number().int().min(0).max(10_000)],
  ['login.headless', z.boolean()],
  ['login.lockoutPattern', regexString],
  ['login.invalidTotpPattern', regexString],
  ['login.invalidPinPattern', regexString],
  ['login.selectors.mobile', z.string().min(1)],
  ['login.selectors.requestOtp', z.string().min(1)],
  ['login.selectors.totp', z.string().min(1)],
  ['login.selectors.totpSubmit', z.string().min(1)],
  ['login.selectors.pin', z.string().min(1)],
  ['login.selectors.pinSubmit', z.string().min(1)],
]);

// ── Driver ───────────────────────────────────────────────────────────────────
const driverSchemas = new Map<string, z.ZodType>([
  ['driver.browserBinary', z.string().min(1)],
  ['driver.cacheDir', z.string().min(1)],
  ['driver.profileDir', z.string().min(1)],
  ['driver.manifestUrl', z.string().url()],
  ['driver.maxAttempts', z.number().int().min(1).max(10)],
  ['driver.backoffBaseMs', z.number().int().min(0).max(300_000)],
  ['driver.checksums', z.record(z.string().regex(/^[a-f0-9]{64}$/i, 'Must be a SHA-256 hex digest'))],
]);

// ── Session ──────────────────────────────────────────────────────────────────
const sessionSchemas = new Map<string, z.ZodType>([
  ['session.safetyMarginSeconds', z.number().int().min(0).max(3600)],
  ['session.dailyExpiry', z.string().regex(timeRegex, 'Must be HH:MM format')],
  ['session.utcOffsetMinutes', z.number().int().min(-720).max(840)],
  ['session.verifyCachedToken', z.boolean()],
  ['session.preMarketLoginEnabled', z.boolean()],
  ['session.preMarketLoginTime', z.string().regex(timeRegex, 'Must be HH:MM format')],
  ['session.timezone', z.string().min(1)],
  ['session.expiryCheckMinutes', z.number().int().min(1).max(60)],
]);

// ── Merged schema map ────────────────────────────────────────────────────────
export const configSchemas: Map<string, z.ZodType> = new Map([
  ...authSchemas,
  ...brokerSchemas,
  ...loginSchemas,
  ...driverSchemas,
  ...sessionSchemas,
]);

/**
 * Look up the Zod schema for a given config key.
 * Returns undefined for unknown keys.
 */
export function getConfigSchema(key: string): z.ZodType | undefined {
  return configSchemas.get(key);
}

/**
 * Validate a value against the schema for the given config key.
 * Unknown keys are considered valid (forward-compatibility).
 */
export function validateConfigValue(
  key: string,
  value: unknown,
): { valid: boolean; error?: string } {
  const schema = configSchemas.get(key);
  if (!schema) {
    return { valid: true };
  }

  const result = schema.safeParse(value);
  if (result.success) {
    return { valid: true };
  }

  const messages = result.error.issues.map((i) => i.message).join('; ');
  return { valid: false, error: messages };
}
