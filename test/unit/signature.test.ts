import { describe, test, expect } from 'vitest';
import { createHmac } from 'crypto';
import { safeEqual, signPayload, verifySignature } from '../../src/server/signature.js';
import { branchFromRef } from '../../src/server/schemas.js';

const body = '{"ref":"refs/heads/main"}';
const secret = 'test-secret';
const expected = 'sha256=' + createHmac('sha256', secret).update(body).digest('hex');

describe('signPayload', () => {
  test('is a sha256 HMAC with the GitHub prefix', () => {
    expect(signPayload(body, secret)).toBe(expected);
    expect(signPayload(Buffer.from(body), secret)).toBe(expected);
  });
});

describe('verifySignature', () => {
  test('accepts the matching signature', () => {
    expect(verifySignature(Buffer.from(body), expected, secret)).toBe(true);
  });

  test('rejects a signature for another body or secret', () => {
    expect(verifySignature('{"ref":"refs/heads/dev"}', expected, secret)).toBe(false);
    expect(verifySignature(body, signPayload(body, 'other-secret'), secret)).toBe(false);
  });

  test('rejects a missing or unprefixed header', () => {
    expect(verifySignature(body, undefined, secret)).toBe(false);
    expect(verifySignature(body, expected.slice('sha256='.length), secret)).toBe(false);
  });

  test('an empty secret disables verification', () => {
    expect(verifySignature(body, undefined, '')).toBe(true);
  });
});

describe('safeEqual', () => {
  test('compares by content and length', () => {
    expect(safeEqual('test-key', 'test-key')).toBe(true);
    expect(safeEqual('test-key', 'test-kez')).toBe(false);
    expect(safeEqual('test-key', 'test-key-longer')).toBe(false);
  });
});

describe('branchFromRef', () => {
  test('keeps slashes after refs/heads/', () => {
    expect(branchFromRef('refs/heads/main')).toBe('main');
    expect(branchFromRef('refs/heads/feature/login')).toBe('feature/login');
    expect(branchFromRef('main')).toBe('main');
  });
});
