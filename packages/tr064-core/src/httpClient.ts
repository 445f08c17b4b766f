import axios, { type RawAxiosResponseHeaders, type AxiosResponseHeaders } from 'axios';
import * as https from 'https';
import { createNullLogger, type ModuleLogger } from './logger';
import { ConnectionError } from './errors';
import { buildDigestAuthorization, parseDigestChallenge, type DigestChallenge } from './digestAuth';

export interface HttpResponse {
  status: number;
  body: string;
  contentType: string;
  headers: Record<string, string>;
}

/**
 * @hebrew ממשק התעבורה ש-SoapClient וטוען המתארים תלויים בו. HttpClient הוא המימוש הרגיל.
 */
export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
  post(url: string, body: string, headers?: Record<string, string>): Promise<HttpResponse>;
}

export interface HttpClientOptions {
  username?: string;
  password?: string;
  timeoutMs?: number;
  // הנתב משתמש בתעודה חתומה-עצמית
  rejectUnauthorized?: boolean;
  logger?: ModuleLogger;
}

const normalizeHeaders = (headers: RawAxiosResponseHeaders | AxiosResponseHeaders): Record<string, string> => {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[name.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[name.toLowerCase()] = value.join(', ');
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      result[name.toLowerCase()] = String(value);
    }
  }
  return result;
};

/**
 * @hebrew לקוח HTTP מבוסס axios עם אימות Digest כאשר מוגדרת סיסמה.
 * האתגר האחרון נשמר, כך שבקשות עוקבות נשלחות מאומתות מראש ורק nonce שפג תוקפו גורם לסבב נוסף.
 */
export class HttpClient implements HttpTransport {
  private username: string;
  private password: string;
  private readonly timeoutMs: number;
  private readonly httpsAgent: https.Agent;
  private readonly logger: ModuleLogger;
  private challenge: DigestChallenge | null = null;
  private nonceCount = 0;

  constructor(options: HttpClientOptions = {}) {
    this.username = options.username ?? '';
    this.password = options.password ?? '';
    this.timeoutMs = options.timeoutMs ?? 10 * 1000;
    this.httpsAgent = new https.Agent({ rejectUnauthorized: options.rejectUnauthorized ?? false });
    this.logger = options.logger ?? createNullLogger();
  }

  get hasCredentials(): boolean {
    return this.password !== '';
  }

  get currentUsername(): string {
    return this.username;
  }

  /**
   * @hebrew מחליף את פרטי ההתחברות ומאפס את אתגר ה-Digest השמור.
   */
  setCredentials(username: string, password: string): void {
    this.username = username;
    this.password = password;
    this.challenge = null;
    this.nonceCount = 0;
  }

  get(url: string): Promise<HttpResponse> {
    return this.request('GET', url);
  }

  post(url: string, body: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.request('POST', url, body, headers);
  }

  private authorizationFor(method: string, url: string): string | undefined {
    if (!this.challenge || !this.hasCredentials) {
      return undefined;
    }
    const { pathname, search } = new URL(url);
    this.nonceCount += 1;
    return buildDigestAuthorization(
      this.challenge,
      { username: this.username, password: this.password },
      method,
      `${pathname}${search}`,
      this.nonceCount,
    );
  }

  private async send(method: string, url: string, body: string | undefined, headers: Record<string, string>): Promise<HttpResponse> {
    const authorization = this.authorizationFor(method, url);
    try {
      const response = await axios.request<string>({
        method,
        url,
        data: body,
        headers: authorization ? { ...headers, Authorization: authorization } : headers,
        timeout: this.timeoutMs,
        responseType: 'text',
        validateStatus: () => true,
        httpsAgent: this.httpsAgent,
      });
      const normalized = normalizeHeaders(response.headers);
      return {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : String(response.data ?? ''),
        contentType: normalized['content-type'] ?? '',
        headers: normalized,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`[HttpClient] ${method} ${url} failed: ${message}`);
      throw new ConnectionError(`Unable to reach '${url}': ${message}`, { cause: error });
    }
  }

  private async request(method: string, url: string, body?: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    this.logger.debug(`[HttpClient] ${method} ${url}`);
    const response = await this.send(method, url, body, headers);
    if (response.status !== 401 || !this.hasCredentials) {
      return response;
    }

    const challenge = parseDigestChallenge(response.headers['www-authenticate'] ?? '');
    if (!challenge) {
      return response;
    }
    this.logger.debug(`[HttpClient] digest challenge received for realm '${challenge.realm}', retrying ${method} ${url}`);
    this.challenge = challenge;
    this.nonceCount = 0;
    return this.send(method, url, body, headers);
  }
}
