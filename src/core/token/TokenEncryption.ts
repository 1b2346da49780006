// src/core/token/TokenEncryption.ts

import * as crypto from 'crypto';

const KEY_PATTERN = /^[0-9a-f]{64}$/i;

function parseKey(key: string, label: string): Buffer {
  if (!KEY_PATTERN.test(key)) {
    throw new Error(`${label} must be a 32-byte hex string (64 hexadecimal characters)`);
  }
  return Buffer.from(key, 'hex');
}

/**
 * AES-256-GCM sealing for stored refresh tokens.
 * Sealed format: iv:authTag:ciphertext (hex).
 */
export class TokenEncryption {
  private currentKey: Buffer;
  private previousKeys: Buffer[];

  constructor(currentKey: string, previousKeys: string[] = []) {
    this.currentKey = parseKey(currentKey, 'Encryption key');
    this.previousKeys = previousKeys.map((key) => parseKey(key, 'Previous encryption key'));
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.currentKey, iv);

    const ciphertext = cipher.update(plaintext, 'utf8', 'hex') + cipher.final('hex');
    const authTag = cipher.getAuthTag();

    return `${iv.toString('hex')}:${authTag.toString('hex')}:${ciphertext}`;
  }

  /**
   * Decrypt with the current key, falling back to rotated-out keys.
   */
  decrypt(sealed: string): string {
    for (const key of [this.currentKey, ...this.previousKeys]) {
      const plaintext = this.tryDecrypt(sealed, key);
      if (plaintext !== undefined) return plaintext;
    }
    throw new Error('Failed to decrypt token with any available key');
  }

  private tryDecrypt(sealed: string, key: Buffer): string | undefined {
    const [iv, authTag, ciphertext] = sealed.split(':');
    if (!iv || !authTag || ciphertext === undefined) return undefined;

    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(iv, 'hex'));
      decipher.setAuthTag(Buffer.from(authTag, 'hex'));
      return decipher.update(ciphertext, 'hex', 'utf8') + decipher.final('utf8');
    } catch {
      // wrong key: authentication tag mismatch
      return undefined;
    }
  }
}
