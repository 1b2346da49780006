// tests/unit/TokenEncryption.test.ts

import { describe, it, expect } from 'vitest';
import { TokenEncryption } from '../../src/core/token/TokenEncryption';

const CURRENT_KEY = 'a'.repeat(64);
const PREVIOUS_KEY = 'b'.repeat(64);
const OTHER_KEY = 'c'.repeat(64);

describe('TokenEncryption', () => {
  it('should reject keys that are not 32-byte hex strings', () => {
    expect(() => new TokenEncryption('abc')).toThrow('32-byte hex string');
    expect(() => new TokenEncryption('')).toThrow('32-byte hex string');
    expect(() => new TokenEncryption('z'.repeat(64))).toThrow('32-byte hex string');
    expect(() => new TokenEncryption('a'.repeat(63))).toThrow('32-byte hex string');
    expect(() => new TokenEncryption('a'.repeat(65))).toThrow('32-byte hex string');
    expect(() => new TokenEncryption(CURRENT_KEY)).not.toThrow();
  });

  it('should reject invalid previous keys', () => {
    expect(() => new TokenEncryption(CURRENT_KEY, ['abc'])).toThrow(
      'Previous encryption key must be a 32-byte hex string (64 hexadecimal characters)'
    );
    expect(() => new TokenEncryption(CURRENT_KEY, [PREVIOUS_KEY])).not.toThrow();
  });

  it('should round-trip a refresh token in iv:authTag:ciphertext form', () => {
    const encryption = new TokenEncryption(CURRENT_KEY);

    const sealed = encryption.encrypt('test-refresh-token');
    const [iv, authTag, ciphertext] = sealed.split(':');

    expect(iv).toHaveLength(32);
    expect(authTag).toHaveLength(32);
    expect(ciphertext).toHaveLength('test-refresh-token'.length * 2);
    expect(encryption.decrypt(sealed)).toBe('test-refresh-token');
  });

  it('should use a fresh IV for every encryption', () => {
    const encryption = new TokenEncryption(CURRENT_KEY);

    const first = encryption.encrypt('test-refresh-token');
    const second = encryption.encrypt('test-refresh-token');

    expect(first).not.toBe(second);
    expect(encryption.decrypt(first)).toBe('test-refresh-token');
    expect(encryption.decrypt(second)).toBe('test-refresh-token');
  });

  it('should decrypt tokens sealed with a rotated-out key', () => {
    const sealed = new TokenEncryption(PREVIOUS_KEY).encrypt('legacy-token');

    const rotated = new TokenEncryption(CURRENT_KEY, [PREVIOUS_KEY]);

    expect(rotated.decrypt(sealed)).toBe('legacy-token');
  });

  it('should always encrypt with the current key', () => {
    const sealed = new TokenEncryption(CURRENT_KEY, [PREVIOUS_KEY]).encrypt('new-token');

    expect(new TokenEncryption(CURRENT_KEY).decrypt(sealed)).toBe('new-token');
    expect(() => new TokenEncryption(PREVIOUS_KEY).decrypt(sealed)).toThrow(
      'Failed to decrypt token with any available key'
    );
  });

  it('should fail with an unknown key', () => {
    const sealed = new TokenEncryption(CURRENT_KEY).encrypt('test-refresh-token');

    expect(() => new TokenEncryption(OTHER_KEY).decrypt(sealed)).toThrow(/Failed to decrypt/);
  });

  it('should reject malformed sealed values', () => {
    const encryption = new TokenEncryption(CURRENT_KEY);

    for (const malformed of ['not-encrypted', 'a:b', 'iv:authTag:invalidCiphertext']) {
      expect(() => encryption.decrypt(malformed)).toThrow(
        'Failed to decrypt token with any available key'
      );
    }
  });

  it('should detect a tampered ciphertext', () => {
    const encryption = new TokenEncryption(CURRENT_KEY);
    const [iv, authTag, ciphertext] = encryption.encrypt('test-refresh-token').split(':');

    const lastChar = ciphertext.slice(-1);
    const flipped = ciphertext.slice(0, -1) + (lastChar === '0' ? '1' : '0');

    expect(() => encryption.decrypt(`${iv}:${authTag}:${flipped}`)).toThrow(/Failed to decrypt/);
  });
});
