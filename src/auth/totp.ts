import { createHmac } from 'node:crypto';

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';

export interface TotpOptions {
  stepSeconds?: number;
  digits?: number;
}

export function normalizeBase32(seed: string): string {
  return seed.replace(/\s+/g, '').replace(/=+$/, '').toUpperCase();
}

export function isValidBase32(seed: string): boolean {
  const normalized = normalizeBase32(seed);
  return normalized.length >= 16 && /^[A-Z2-7]+$/.test(normalized);
}

export function base32Decode(seed: string): Buffer {
  const normalized = normalizeBase32(seed);
  let bits = 0;
  let value = 0;
  const out: number[] = [];

  for (const char of normalized) {
    const idx = BASE32_ALPHABET.indexOf(char);
    if (idx === -1) {
      throw new Error('TOTP seed is not valid base32');
    }
    value = (value << 5) | idx;
    bits += 5;
    if (bits >= 8) {
      out.push((value >>> (bits - 8)) & 0xff);
      bits -= 8;
    }
  }

  return Buffer.from(out);
}

/** HOTP value for a moving-factor counter (RFC 4226 dynamic truncation). */
export function hotp(key: Buffer, counter: number, digits = 6): string {
  const msg = Buffer.alloc(8);
  msg.writeBigUInt64BE(BigInt(counter));
  const digest = createHmac('sha1', key).update(msg).digest();
  const offset = digest[digest.length - 1] & 0x0f;
  const binary =
    ((digest[offset] & 0x7f) << 24) |
    (digest[offset + 1] << 16) |
    (digest[offset + 2] << 8) |
    digest[offset + 3];
  return (binary % 10 ** digits).toString().padStart(digits, '0');
}

export function timeStep(atMs: number, stepSeconds = 30): number {
  return Math.floor(atMs / 1000 / stepSeconds);
}

export function generateTotp(seed: string, atMs = Date.now(), opts: TotpOptions = {}): string {
  const stepSeconds = opts.stepSeconds ?? 30;
  return hotp(base32Decode(seed), timeStep(atMs, stepSeconds), opts.digits ?? 6);
}

/**
 * Code for the neighbouring window nearest to `atMs`: the next step when we are
 * in the second half of the current window, the previous step otherwise.
 */
export function adjacentTotp(seed: string, atMs = Date.now(), opts: TotpOptions = {}): string {
  const stepSeconds = opts.stepSeconds ?? 30;
  const step = timeStep(atMs, stepSeconds);
  const intoWindowMs = atMs - step * stepSeconds * 1000;
  const neighbour = intoWindowMs >= (stepSeconds * 1000) / 2 ? step + 1 : step - 1;
  return hotp(base32Decode(seed), neighbour, opts.digits ?? 6);
}
