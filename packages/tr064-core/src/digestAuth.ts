import { createHash, randomBytes } from 'crypto';

/**
 * אתגר Digest כפי שהתקבל בכותרת WWW-Authenticate (RFC 7616).
 */
export interface DigestChallenge {
  realm: string;
  nonce: string;
  qop?: string;
  algorithm: string;
  opaque?: string;
}

export interface DigestCredentials {
  username: string;
  password: string;
}

const HASH_BY_ALGORITHM: Record<string, string> = {
  'MD5': 'md5',
  'MD5-SESS': 'md5',
  'SHA-256': 'sha256',
  'SHA-256-SESS': 'sha256',
};

/**
 * @hebrew מפרק כותרת WWW-Authenticate מסוג Digest לשדותיה.
 * @returns null אם הכותרת אינה אתגר Digest תקין או שהאלגוריתם אינו נתמך.
 */
export function parseDigestChallenge(header: string): DigestChallenge | null {
  const match = /^\s*Digest\s+(.*)$/is.exec(header);
  if (!match) {
    return null;
  }
  const params = new Map<string, string>();
  const paramPattern = /([a-z0-9_-]+)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^\s,]*))/gi;
  for (const part of match[1].matchAll(paramPattern)) {
    params.set(part[1].toLowerCase(), part[2] !== undefined ? part[2].replace(/\\(.)/g, '$1') : part[3]);
  }
  const realm = params.get('realm');
  const nonce = params.get('nonce');
  if (realm === undefined || nonce === undefined) {
    return null;
  }
  const algorithm = (params.get('algorithm') ?? 'MD5').toUpperCase();
  if (!(algorithm in HASH_BY_ALGORITHM)) {
    return null;
  }
  return {
    realm,
    nonce,
    algorithm,
    qop: params.get('qop'),
    opaque: params.get('opaque'),
  };
}

/**
 * @hebrew מחשב את ערך כותרת Authorization עבור בקשה, לפי אתגר Digest.
 * @param nonceCount - מונה השימושים ב-nonce (nc), מתחיל ב-1.
 * @param cnonce - ערך cnonce; כברירת מחדל נוצר אקראית.
 */
export function buildDigestAuthorization(
  challenge: DigestChallenge,
  credentials: DigestCredentials,
  method: string,
  uri: string,
  nonceCount: number,
  cnonce: string = randomBytes(8).toString('hex'),
): string {
  const hashName = HASH_BY_ALGORITHM[challenge.algorithm] ?? 'md5';
  const hash = (value: string) => createHash(hashName).update(value).digest('hex');

  // qop יכול להכיל רשימה ("auth,auth-int"); רק auth נתמך
  const qop = challenge.qop?.split(',').map(q => q.trim()).find(q => q === 'auth');
  const nc = nonceCount.toString(16).padStart(8, '0');

  let ha1 = hash(`${credentials.username}:${challenge.realm}:${credentials.password}`);
  if (challenge.algorithm.endsWith('-SESS')) {
    ha1 = hash(`${ha1}:${challenge.nonce}:${cnonce}`);
  }
  const ha2 = hash(`${method.toUpperCase()}:${uri}`);
  const response = qop
    ? hash(`${ha1}:${challenge.nonce}:${nc}:${cnonce}:${qop}:${ha2}`)
    : hash(`${ha1}:${challenge.nonce}:${ha2}`);

  const parts = [
    `username="${credentials.username}"`,
    `realm="${challenge.realm}"`,
    `nonce="${challenge.nonce}"`,
    `uri="${uri}"`,
    `algorithm=${challenge.algorithm}`,
    `response="${response}"`,
  ];
  if (qop) {
    parts.push(`qop=${qop}`, `nc=${nc}`, `cnonce="${cnonce}"`);
  }
  if (challenge.opaque !== undefined) {
    parts.push(`opaque="${challenge.opaque}"`);
  }
  return `Digest ${parts.join(', ')}`;
}
