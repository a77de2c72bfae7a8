import { describe, it, expect } from 'vitest';
import { decodeAuthConfig, encodeAuthConfig } from '../registry-auth.js';
import { EngineError, EngineErrorKind } from '../../errors.js';

describe('encodeAuthConfig', () => {
  it('should encode credentials as base64 JSON', () => {
    const encoded = encodeAuthConfig({ username: 'ci', password: 'test-secret' });

    expect(encoded).toBe('eyJ1c2VybmFtZSI6ImNpIiwicGFzc3dvcmQiOiJ0ZXN0LXNlY3JldCJ9');
  });

  it('should use the URL-safe alphabet and keep padding', () => {
    expect(encodeAuthConfig({ password: 'x>>>?' })).toBe('eyJwYXNzd29yZCI6Ing-Pj4_In0=');
    expect(encodeAuthConfig({ password: 'test~~~' })).toBe('eyJwYXNzd29yZCI6InRlc3R-fn4ifQ==');
  });
});

describe('decodeAuthConfig', () => {
  it('should decode URL-safe values', () => {
    expect(decodeAuthConfig('eyJwYXNzd29yZCI6Ing-Pj4_In0=')).toEqual({ password: 'x>>>?' });
  });

  it('should accept standard base64', () => {
    expect(decodeAuthConfig('eyJwYXNzd29yZCI6Ing+Pj4/In0=')).toEqual({ password: 'x>>>?' });
  });

  it('should decode what encodeAuthConfig produces', () => {
    const config = {
      username: 'deploy',
      password: 'test-secret',
      serveraddress: 'registry.example.com',
    };

    expect(decodeAuthConfig(encodeAuthConfig(config))).toEqual(config);
  });

  it('should reject empty values', () => {
    expect(() => decodeAuthConfig('  ')).toThrow('Encoded registry auth cannot be empty');
  });

  it('should reject values outside the base64 alphabet', () => {
    let caught: unknown;
    try {
      decodeAuthConfig('not base64!');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EngineError);
    expect(caught).toMatchObject({ kind: EngineErrorKind.InvalidCredentials });
  });

  it('should reject payloads that are not JSON', () => {
    // "hello"
    expect(() => decodeAuthConfig('aGVsbG8=')).toThrow('Encoded registry auth is not valid JSON');
  });

  it('should reject payloads with non-string fields', () => {
    // {"username":1}
    expect(() => decodeAuthConfig('eyJ1c2VybmFtZSI6MX0=')).toThrow(/Invalid registry auth payload/);
  });
});
