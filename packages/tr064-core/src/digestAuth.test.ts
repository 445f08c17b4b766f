import { describe, it, expect } from 'vitest';
import { buildDigestAuthorization, parseDigestChallenge, type DigestChallenge } from './digestAuth';

const credentials = { username: 'test-user', password: 'test-secret' };
const uri = '/upnp/control/deviceinfo';
const cnonce = '0a4f113b';

const challenge = (overrides: Partial<DigestChallenge> = {}): DigestChallenge => ({
  realm: 'test-realm',
  nonce: 'abc123',
  qop: 'auth',
  algorithm: 'MD5',
  ...overrides,
});

describe('parseDigestChallenge', () => {
  it('reads quoted and bare parameters', () => {
    const parsed = parseDigestChallenge('Digest realm="test-realm", nonce="abc123", qop="auth,auth-int", algorithm=sha-256, opaque="xyz"');
    expect(parsed).toEqual({
      realm: 'test-realm',
      nonce: 'abc123',
      qop: 'auth,auth-int',
      algorithm: 'SHA-256',
      opaque: 'xyz',
    });
  });

  it('defaults to MD5 without qop', () => {
    expect(parseDigestChallenge('Digest realm="r", nonce="n"')).toEqual({
      realm: 'r',
      nonce: 'n',
      qop: undefined,
      algorithm: 'MD5',
      opaque: undefined,
    });
  });

  it('rejects other schemes, missing fields and unknown algorithms', () => {
    expect(parseDigestChallenge('Basic realm="r"')).toBeNull();
    expect(parseDigestChallenge('Digest realm="r"')).toBeNull();
    expect(parseDigestChallenge('Digest realm="r", nonce="n", algorithm=SHA-512-256')).toBeNull();
    expect(parseDigestChallenge('')).toBeNull();
  });
});

describe('buildDigestAuthorization', () => {
  it('computes an MD5 response with qop', () => {
    expect(buildDigestAuthorization(challenge(), credentials, 'POST', uri, 1, cnonce)).toBe(
      'Digest username="test-user", realm="test-realm", nonce="abc123", uri="/upnp/control/deviceinfo", '
      + 'algorithm=MD5, response="669bf0a0912b87fc18665bc91f32f6b7", qop=auth, nc=00000001, cnonce="0a4f113b"',
    );
  });

  it('computes an MD5 response without qop', () => {
    expect(buildDigestAuthorization(challenge({ qop: undefined }), credentials, 'POST', uri, 1, cnonce)).toBe(
      'Digest username="test-user", realm="test-realm", nonce="abc123", uri="/upnp/control/deviceinfo", '
      + 'algorithm=MD5, response="674dd56b27e83a804e96d0c19bce09a2"',
    );
  });

  it('computes SHA-256 responses', () => {
    const withQop = buildDigestAuthorization(challenge({ algorithm: 'SHA-256' }), credentials, 'POST', uri, 1, cnonce);
    expect(withQop).toContain('response="da557c44eb0f41659e1e643ea415217cfe42c6c4e0545c0f8c3a79c4a62d8dd2"');
    const withoutQop = buildDigestAuthorization(challenge({ algorithm: 'SHA-256', qop: undefined }), credentials, 'POST', uri, 1, cnonce);
    expect(withoutQop).toContain('response="134f18e81e497edcdfdc947d2cdb7688acb88167cccc28337f8ce32cc781ed60"');
  });

  it('hashes the nonce into HA1 for session algorithms', () => {
    const md5 = buildDigestAuthorization(challenge({ algorithm: 'MD5-SESS' }), credentials, 'POST', uri, 2, cnonce);
    expect(md5).toContain('response="330bf37552824b42dd57f101db11c7ae"');
    expect(md5).toContain('nc=00000002');
    const sha = buildDigestAuthorization(challenge({ algorithm: 'SHA-256-SESS' }), credentials, 'POST', uri, 2, cnonce);
    expect(sha).toContain('response="7c9d6bdedbbe6cd9f5082bb2b30b9d79326263382245c221f73c8cf3b0288adc"');
  });

  it('picks auth from a qop list and passes the opaque value back', () => {
    const header = buildDigestAuthorization(challenge({ qop: 'auth-int, auth', opaque: 'xyz' }), credentials, 'POST', uri, 1, cnonce);
    expect(header.endsWith('qop=auth, nc=00000001, cnonce="0a4f113b", opaque="xyz"')).toBe(true);
    expect(header).toContain('response="669bf0a0912b87fc18665bc91f32f6b7"');
  });

  it('generates a cnonce when none is given', () => {
    expect(buildDigestAuthorization(challenge(), credentials, 'GET', '/tr64desc.xml', 1)).toMatch(/cnonce="[0-9a-f]{16}"$/);
  });
});
