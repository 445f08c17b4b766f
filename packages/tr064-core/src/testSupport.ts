// עזרי בדיקה משותפים: קבצי fixtures ותעבורת HTTP מזויפת שמגישה אותם
import { readFileSync } from 'fs';
import path from 'path';
import type { Server } from 'net';
import { fileURLToPath } from 'url';
import { defaultConfig, type Tr064Config } from './config';
import type { HttpResponse, HttpTransport } from './httpClient';

export const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

export const readFixture = (name: string): string => readFileSync(path.join(FIXTURES_DIR, name), 'utf-8');

export const ROUTER_URL = 'http://router.test:49000';

// כל המסמכים שהנתב המדומה מגיש. wancommonifconfigSCPD.xml חסר בכוונה
export const ROUTER_DOCUMENTS = [
  'tr64desc.xml',
  'igddesc.xml',
  'deviceinfoSCPD.xml',
  'deviceconfigSCPD.xml',
  'lanconfigsecuritySCPD.xml',
  'wanipconnSCPD.xml',
  'igdconnSCPD.xml',
  'any.xml',
  'layer3forwardingSCPD.xml',
];

export const xmlResponse = (body: string, status: number = 200): HttpResponse => ({
  status,
  body,
  contentType: 'text/xml; charset="utf-8"',
  headers: { 'content-type': 'text/xml; charset="utf-8"' },
});

export const htmlResponse = (status: number, body: string): HttpResponse => ({
  status,
  body,
  contentType: 'text/html',
  headers: { 'content-type': 'text/html' },
});

export const NOT_FOUND = htmlResponse(404, '<html><body><h1>404 Not Found</h1></body></html>');

export interface RecordedRequest {
  method: 'GET' | 'POST';
  url: string;
  body?: string;
  headers?: Record<string, string>;
}

type PostHandler = (url: string, body: string, headers: Record<string, string>) => HttpResponse;

/**
 * @hebrew תעבורה בזיכרון: מחזירה תשובות קבועות לפי כתובת ורושמת כל בקשה.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, HttpResponse>();
  private postHandler: PostHandler | null = null;

  on(url: string, response: HttpResponse): this {
    this.routes.set(url, response);
    return this;
  }

  onPost(handler: PostHandler): this {
    this.postHandler = handler;
    return this;
  }

  async get(url: string): Promise<HttpResponse> {
    this.requests.push({ method: 'GET', url });
    return this.routes.get(url) ?? NOT_FOUND;
  }

  async post(url: string, body: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    this.requests.push({ method: 'POST', url, body, headers });
    return this.postHandler ? this.postHandler(url, body, headers) : NOT_FOUND;
  }
}

/** תעבורה שמגישה את כל מסמכי הנתב המדומה תחת baseUrl. */
export function routerTransport(baseUrl: string = ROUTER_URL): FakeTransport {
  const transport = new FakeTransport();
  for (const name of ROUTER_DOCUMENTS) {
    transport.on(`${baseUrl}/${name}`, xmlResponse(readFixture(name)));
  }
  return transport;
}

/** מעטפת תשובת SOAP עם ערכי הארגומנטים היוצאים. */
export function soapResponse(serviceType: string, actionName: string, values: Record<string, string>): string {
  const elements = Object.entries(values).map(([name, value]) => `<${name}>${value}</${name}>`).join('');
  return '<?xml version="1.0"?>'
    + '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">'
    + `<s:Body><u:${actionName}Response xmlns:u="${serviceType}">${elements}</u:${actionName}Response></s:Body>`
    + '</s:Envelope>';
}

/** מעטפת SOAP Fault עם קוד ותיאור שגיאה. */
export function soapFault(errorCode: number, errorDescription: string): string {
  return '<?xml version="1.0"?>'
    + '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">'
    + '<s:Body><s:Fault><faultcode>s:Client</faultcode><faultstring>UPnPError</faultstring>'
    + '<detail><UPnPError xmlns="urn:dslforum-org:control-1-0">'
    + `<errorCode>${errorCode}</errorCode><errorDescription>${errorDescription}</errorDescription>`
    + '</UPnPError></detail></s:Fault></s:Body></s:Envelope>';
}

/** תצורה קבועה לבדיקות, שאינה מושפעת מקובץ .env או ממשתני הסביבה. */
export function testConfig(overrides: { connection?: Partial<Tr064Config['connection']>; cache?: Partial<Tr064Config['cache']>; monitor?: Partial<Tr064Config['monitor']> } = {}): Tr064Config {
  return {
    connection: { ...defaultConfig.connection, ...overrides.connection },
    cache: { ...defaultConfig.cache, ...overrides.cache },
    monitor: { ...defaultConfig.monitor, ...overrides.monitor },
  };
}

/** מאזין בפורט פנוי על 127.0.0.1 ומחזיר את מספר הפורט. */
export async function listenLocal(server: Server): Promise<number> {
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
}

export const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
