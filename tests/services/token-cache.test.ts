import { describe, it, expect } from 'vitest';
import { TokenCache, TOKEN_EXPIRY_BUFFER_MS } from '../../src/services/token-cache.js';

describe('TokenCache', () => {
  const T0 = 1_700_000_000_000;

  function createCache() {
    let now = T0;
    const cache = new TokenCache(() => now);
    return {
      cache,
      advance(ms: number) {
        now += ms;
      },
    };
  }

  it('should start empty and expired', () => {
    const { cache } = createCache();
    expect(cache.accessToken).toBeNull();
    expect(cache.refreshToken).toBeNull();
    expect(cache.isExpired()).toBe(true);
    expect(cache.isValid()).toBe(false);
    expect(cache.getExpiresInSeconds()).toBe(0);
  });

  it('should compute expiry at the time tokens are stored', () => {
    const { cache } = createCache();
    cache.setTokens('A1', 'R1', 3600);

    expect(cache.accessToken).toBe('A1');
    expect(cache.refreshToken).toBe('R1');
    expect(cache.expiresAt).toBe(T0 + 3600 * 1000);
  });

  it('should stay fresh until 60 seconds before expiry', () => {
    const { cache, advance } = createCache();
    cache.setTokens('A1', 'R1', 3600);

    advance(3539 * 1000);
    expect(cache.isExpired()).toBe(false);
    expect(cache.isValid()).toBe(true);

    advance(2 * 1000); // T0 + 3541s
    expect(cache.isExpired()).toBe(true);
    expect(cache.isValid()).toBe(false);
  });

  it('should treat the exact buffer boundary as expired', () => {
    const { cache, advance } = createCache();
    cache.setTokens('A1', 'R1', 3600);

    advance(3600 * 1000 - TOKEN_EXPIRY_BUFFER_MS);
    expect(cache.isExpired()).toBe(true);
  });

  it('should treat tokens shorter than the buffer as already expired', () => {
    const { cache } = createCache();
    cache.setTokens('A1', 'R1', 30);
    expect(cache.isExpired()).toBe(true);
    // 剩餘秒數仍回報實際時間
    expect(cache.getExpiresInSeconds()).toBe(30);
  });

  it('should report remaining lifetime in whole seconds', () => {
    const { cache, advance } = createCache();
    cache.setTokens('A1', 'R1', 3600);

    advance(1500);
    expect(cache.getExpiresInSeconds()).toBe(3598);

    advance(4000 * 1000);
    expect(cache.getExpiresInSeconds()).toBe(0);
  });

  it('should replace all fields together', () => {
    const { cache, advance } = createCache();
    cache.setTokens('A1', 'R1', 3600);
    advance(10 * 1000);
    cache.setTokens('A2', 'R2', 1800);

    expect(cache.accessToken).toBe('A2');
    expect(cache.refreshToken).toBe('R2');
    expect(cache.expiresAt).toBe(T0 + 10 * 1000 + 1800 * 1000);
  });

  it('should clear all fields', () => {
    const { cache } = createCache();
    cache.setTokens('A1', 'R1', 3600);
    cache.clear();

    expect(cache.accessToken).toBeNull();
    expect(cache.refreshToken).toBeNull();
    expect(cache.expiresAt).toBe(0);
    expect(cache.isExpired()).toBe(true);
  });
});
