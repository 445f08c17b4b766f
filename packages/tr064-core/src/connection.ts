import { createNullLogger, type ModuleLogger } from './logger';
import { loadConfig, type Tr064Config } from './config';
import { ActionNotFoundError, CacheError, ResourceError, ServiceNotFoundError } from './errors';
import { HttpClient } from './httpClient';
import { SoapClient } from './soapClient';
import { DeviceManager } from './deviceManager';
import { ApiCache } from './apiCache';
import type { Service } from './descriptionModel';
import type { ActionArguments, ActionResult, ActionValue } from './types';
import { attributeOf, childNodes, parseXml, textOf } from './xmlUtils';

export const TR64_DESCRIPTION_FILE = 'tr64desc.xml';
export const IGD_DESCRIPTION_FILE = 'igddesc.xml';
export const BOXINFO_FILE = 'jason_boxinfo.xml';
// שם המשתמש ההיסטורי, תקף רק לגרסאות מערכת שלפני 7.24
export const LEGACY_USERNAME = 'dslf-config';
export const USERNAME_REQUIRED_VERSION = 7.24;

export interface Tr064ConnectionOptions {
  address?: string;
  port?: number;
  useTls?: boolean;
  username?: string;
  password?: string;
  timeoutMs?: number;
  useCache?: boolean;
  verifyCache?: boolean;
  cacheDirectory?: string;
  // ברירת מחדל: http(s)://<address>/jason_boxinfo.xml
  boxInfoUrl?: string;
  // ברירת מחדל: loadConfig()
  config?: Tr064Config;
  logger?: ModuleLogger;
  // להזרקת לקוח HTTP מוכן (למשל בבדיקות)
  http?: HttpClient;
}

interface ResolvedOptions {
  host: string;
  baseUrl: string;
  boxInfoUrl: string;
  username: string;
  password: string;
  useCache: boolean;
  verifyCache: boolean;
  cacheDirectory: string;
}

/**
 * @hebrew ממשק אחיד לנתב: גילוי הסכמה, נרמול שמות שירותים והפעלת פעולות.
 * נוצר פעם אחת לכל התקן ונשמר לשימוש חוזר; גילוי מחדש הוא פעולה מפורשת ונדירה.
 *
 * ```ts
 * const connection = await Tr064Connection.create({ address: '192.168.178.1', password: 'test-secret' });
 * const status = await connection.callAction('WANIPConn', 'GetStatusInfo');
 * ```
 */
export class Tr064Connection {
  readonly address: string;
  readonly baseUrl: string;
  private readonly http: HttpClient;
  private readonly soap: SoapClient;
  private readonly deviceManager: DeviceManager;
  private readonly logger: ModuleLogger;
  private readonly resolved: ResolvedOptions;
  private updateCheckResult: Record<string, string> | null = null;

  private constructor(resolved: ResolvedOptions, http: HttpClient, logger: ModuleLogger) {
    this.resolved = resolved;
    this.address = resolved.host;
    this.baseUrl = resolved.baseUrl;
    this.http = http;
    this.logger = logger;
    this.soap = new SoapClient({ http, baseUrl: resolved.baseUrl, logger });
    this.deviceManager = new DeviceManager({ http, logger });
  }

  /**
   * @hebrew יוצר חיבור: פותר ברירות מחדל מהתצורה, טוען את הסכמה (מהנתב או מהמטמון)
   * ומעדכן את שם המשתמש כאשר נדרש.
   * @throws ConnectionError כאשר המתאר הראשי אינו זמין.
   */
  static async create(options: Tr064ConnectionOptions = {}): Promise<Tr064Connection> {
    const config = options.config ?? loadConfig();
    const logger = options.logger ?? createNullLogger();
    const useTls = options.useTls ?? config.connection.useTls;
    const host = (options.address ?? config.connection.address).split('//').pop() ?? '';
    const hostname = host.replace(/\/+$/, '');
    const port = options.port ?? (useTls ? config.connection.tlsPort : config.connection.port);
    const scheme = useTls ? 'https' : 'http';

    const resolved: ResolvedOptions = {
      host: hostname,
      baseUrl: `${scheme}://${hostname}:${port}`,
      boxInfoUrl: options.boxInfoUrl ?? `${scheme}://${hostname}/${BOXINFO_FILE}`,
      username: options.username ?? config.connection.username,
      password: options.password ?? config.connection.password,
      useCache: options.useCache ?? config.cache.useCache,
      verifyCache: options.verifyCache ?? config.cache.verifyCache,
      cacheDirectory: options.cacheDirectory ?? config.cache.directory,
    };
    const http = options.http ?? new HttpClient({
      username: resolved.username,
      password: resolved.password,
      timeoutMs: options.timeoutMs ?? config.connection.timeoutMs,
      logger,
    });

    const connection = new Tr064Connection(resolved, http, logger);
    await connection.loadApi();
    await connection.resetUsername();
    return connection;
  }

  /**
   * @hebrew מנרמל שם שירות: "X:n" הופך ל-"Xn", שם שאינו מסתיים בספרה מקבל "1".
   * הפונקציה מוגדרת לכל קלט ואידמפוטנטית.
   */
  static normalizeName(name: string): string {
    const separator = name.indexOf(':');
    if (separator >= 0) {
      const normalized = name.slice(0, separator) + name.slice(separator + 1).replace(/:/g, '');
      return Tr064Connection.normalizeName(normalized);
    }
    return /\d$/.test(name) ? name : `${name}1`;
  }

  get services(): ReadonlyMap<string, Service> {
    return this.deviceManager.services;
  }

  get modelName(): string | null {
    return this.deviceManager.modelName;
  }

  get systemVersion(): string | null {
    return this.deviceManager.systemVersion;
  }

  get username(): string {
    return this.http.currentUsername;
  }

  toString(): string {
    return `Tr064Connection(${this.modelName ?? 'unknown model'} at ${this.baseUrl}, version ${this.systemVersion ?? 'unknown'})`;
  }

  /**
   * @hebrew מפעיל פעולה של שירות. שם השירות מנורמל; שירות או פעולה שאינם קיימים
   * נדחים לפני כל תקשורת.
   * @throws ServiceNotFoundError, ActionNotFoundError, או שגיאות SoapClient.invoke.
   */
  async callAction(serviceName: string, actionName: string, args: ActionArguments = {}): Promise<ActionResult> {
    const normalized = Tr064Connection.normalizeName(serviceName);
    const service = this.deviceManager.services.get(normalized);
    if (!service) {
      throw new ServiceNotFoundError(normalized);
    }
    if (!service.hasAction(actionName)) {
      throw new ActionNotFoundError(normalized, actionName);
    }
    return this.soap.invoke(service, actionName, args);
  }

  /** מבקש מהנתב לנתק ולהתחבר מחדש (כתובת IP חדשה). */
  async reconnect(): Promise<void> {
    await this.callAction('WANIPConn1', 'ForceTermination');
  }

  async reboot(): Promise<void> {
    await this.callAction('DeviceConfig1', 'Reboot');
  }

  /**
   * @hebrew תיאור ההתקן מ-DeviceInfo1.GetInfo (שדה NewDescription).
   */
  async deviceDescription(): Promise<ActionValue | undefined> {
    const info = await this.callAction('DeviceInfo1', 'GetInfo');
    return info.NewDescription;
  }

  /**
   * @hebrew מידע על החומרה והתוכנה מ-jason_boxinfo.xml כרשומה שטוחה (Name, Version, ...).
   * התוצאה נשמרת לאחר הקריאה הראשונה.
   */
  async updateCheck(): Promise<Record<string, string>> {
    if (this.updateCheckResult) {
      return this.updateCheckResult;
    }
    const url = this.resolved.boxInfoUrl;
    const response = await this.http.get(url);
    if (response.status !== 200) {
      throw new ResourceError(`Unable to load '${url}' (HTTP ${response.status})`);
    }
    const root = await parseXml(response.body);
    const result: Record<string, string> = {};
    for (const [name, value] of Object.entries(root)) {
      if (name !== '$') {
        result[name] = textOf(value);
      }
    }
    this.updateCheckResult = result;
    return result;
  }

  /**
   * @hebrew מריץ גילוי מחדש מול הנתב ומחליף את הסכמה כולה.
   */
  async rediscover(): Promise<void> {
    await this.loadApiFromRouter();
  }

  private async loadApiFromRouter(): Promise<void> {
    await this.deviceManager.discover({
      primary: `${this.baseUrl}/${TR64_DESCRIPTION_FILE}`,
      additional: this.http.hasCredentials ? [`${this.baseUrl}/${IGD_DESCRIPTION_FILE}`] : [],
    });
  }

  private async loadApi(): Promise<void> {
    if (!this.resolved.useCache) {
      await this.loadApiFromRouter();
      return;
    }
    const cache = new ApiCache({ address: this.address, directory: this.resolved.cacheDirectory, logger: this.logger });
    const reload = async () => {
      await this.loadApiFromRouter();
      await cache.write(this.deviceManager.serialize());
    };

    let data: unknown;
    try {
      data = await cache.read();
      if (data !== null) {
        this.deviceManager.restore(data);
      }
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      this.logger.warn(`[loadApi] ignoring cache: ${error.message}`);
      data = null;
    }

    if (data === null) {
      await reload();
      return;
    }
    if (this.resolved.verifyCache && !(await this.isValidCache())) {
      this.logger.info('[loadApi] cached schema does not match the device, reloading');
      await reload();
    }
  }

  /**
   * @hebrew משווה את שם הדגם וגרסת המערכת מהמטמון למידע העדכני של הנתב.
   */
  private async isValidCache(): Promise<boolean> {
    const systemInfo = this.deviceManager.systemInfo;
    let current: Record<string, string>;
    try {
      current = await this.updateCheck();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`[isValidCache] unable to verify cache: ${message}`);
      return false;
    }
    return this.deviceManager.modelName === current.Name
      && systemInfo !== null
      && systemInfo[5] === current.Version;
  }

  /**
   * @hebrew מגרסה 7.24 נדרש שם משתמש: כאשר הועברה סיסמה עם שם המשתמש ההיסטורי,
   * עוברים למשתמש שהתחבר לאחרונה לפי LANConfigSecurity1.
   */
  private async resetUsername(): Promise<void> {
    const version = parseFloat(this.systemVersion ?? '');
    if (Number.isNaN(version) || version < USERNAME_REQUIRED_VERSION) {
      return;
    }
    if (this.resolved.username !== LEGACY_USERNAME || !this.resolved.password) {
      return;
    }
    const response = await this.callAction('LANConfigSecurity1', 'X_AVM-DE_GetUserList');
    const userList = response['NewX_AVM-DE_UserList'];
    if (typeof userList !== 'string') {
      return;
    }
    const root = await parseXml(userList);
    const lastUser = childNodes(root, 'Username').find(node => attributeOf(node, 'last_user') === '1');
    if (lastUser) {
      const username = textOf(lastUser);
      this.logger.info(`[resetUsername] switching to last logged-in user '${username}'`);
      this.http.setCredentials(username, this.resolved.password);
    }
  }
}
