import { computeSignature, verifySignature } from './webhook-signature';

describe('webhook-signature', () => {
  const secret = 'test-secret';
  const body = Buffer.from('{"list_folder":{"accounts":["dbid:test"]}}');

  it('should produce a 64 character hex digest', () => {
    expect(computeSignature(secret, body)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should accept the correct signature', () => {
    expect(verifySignature(secret, body, computeSignature(secret, body))).toBe(true);
  });

  it('should reject a signature made with another secret', () => {
    expect(verifySignature(secret, body, computeSignature('other-secret', body))).toBe(false);
  });

  it('should reject a signature over a different body', () => {
    const signature = computeSignature(secret, Buffer.from('{}'));

    expect(verifySignature(secret, body, signature)).toBe(false);
  });

  it('should reject missing, malformed and wrong-length signatures without throwing', () => {
    const valid = computeSignature(secret, body);

    expect(verifySignature(secret, body, undefined)).toBe(false);
    expect(verifySignature(secret, body, '')).toBe(false);
    expect(verifySignature(secret, body, 'not-hex')).toBe(false);
    expect(verifySignature(secret, body, valid.slice(0, 32))).toBe(false);
    expect(verifySignature(secret, body, `${valid}00`)).toBe(false);
  });
});
