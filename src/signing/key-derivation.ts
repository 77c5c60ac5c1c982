/**
 * Signing key derivation for Signature V4
 */

import { hmacSha256 } from './crypto.js';

/**
 * kSecret = "AWS4" + secret
 * kDate = HMAC(kSecret, dateStamp)
 * kRegion = HMAC(kDate, region)
 * kService = HMAC(kRegion, service)
 * kSigning = HMAC(kService, "aws4_request")
 */
export function deriveSigningKey(
  secretKey: string,
  dateStamp: string,
  region: string,
  service: string
): Uint8Array {
  const kSecret = new TextEncoder().encode(`AWS4${secretKey}`);
  const kDate = hmacSha256(kSecret, dateStamp);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  return hmacSha256(kService, 'aws4_request');
}

/**
 * Keeps the signing keys of the current day. Keys only depend on the date,
 * region and service, so every request of one day reuses them.
 */
export class SigningKeyCache {
  private readonly cache = new Map<string, { key: Uint8Array; date: string }>();

  getSigningKey(secretKey: string, dateStamp: string, region: string, service: string): Uint8Array {
    const cacheKey = `${secretKey}:${dateStamp}:${region}:${service}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached.key;
    }

    const key = deriveSigningKey(secretKey, dateStamp, region, service);
    this.evictOtherDays(dateStamp);
    this.cache.set(cacheKey, { key, date: dateStamp });
    return key;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }

  private evictOtherDays(currentDate: string): void {
    for (const [key, value] of this.cache.entries()) {
      if (value.date !== currentDate) {
        this.cache.delete(key);
      }
    }
  }
}
