import path from 'path';
import { createNullLogger, type ModuleLogger } from './logger';
import { CacheError, ConnectionError, ResourceError } from './errors';
import type { HttpTransport } from './httpClient';
import { Description, type Service } from './descriptionModel';
import {
  isUrlSource,
  isXmlSource,
  loadSource,
  parseDeviceDescription,
  parseServiceSchema,
} from './descriptionProcessor';
import type { ApiSnapshot, DescriptionJson } from './types';

export interface DiscoverOptions {
  // המתאר הראשי; כשל בטעינתו קטלני
  primary: string;
  // מתארים נוספים; מקור שאינו זמין מדולג
  additional?: string[];
  // בסיס לכתובות SCPD יחסיות כאשר המתאר ניתן כמחרוזת XML
  baseUrl?: string;
}

export interface DeviceManagerOptions {
  http: HttpTransport;
  logger?: ModuleLogger;
}

interface DiscoveredDescription {
  description: Description;
  source: string;
}

/**
 * @hebrew מנהל את מתארי ההתקן ואת רשם השירותים השטוח (שם -> שירות).
 * כל מעבר גילוי בונה מבנים חדשים ומחליף את הקודמים בשלמותם; הרשם אינו משתנה בין מעברים.
 */
export class DeviceManager {
  private readonly http: HttpTransport;
  private readonly logger: ModuleLogger;
  private _descriptions: readonly Description[] = [];
  private _services: ReadonlyMap<string, Service> = new Map();

  constructor(options: DeviceManagerOptions) {
    this.http = options.http;
    this.logger = options.logger ?? createNullLogger();
  }

  get descriptions(): readonly Description[] {
    return this._descriptions;
  }

  get services(): ReadonlyMap<string, Service> {
    return this._services;
  }

  /** שם הדגם של ההתקן הראשי במתאר הראשון. */
  get modelName(): string | null {
    return this._descriptions[0]?.modelName || null;
  }

  /** גרסת המערכת ("7.29"), מהמתאר הראשון שמכיל אותה. */
  get systemVersion(): string | null {
    for (const description of this._descriptions) {
      if (description.systemVersionString) {
        return description.systemVersionString;
      }
    }
    return null;
  }

  get systemInfo(): [string, string, string, string, string, string] | null {
    for (const description of this._descriptions) {
      if (description.systemInfo) {
        return description.systemInfo;
      }
    }
    return null;
  }

  /**
   * @hebrew מריץ מעבר גילוי מלא: מתארים, רשם שירותים וטעינת כל מסמכי ה-SCPD במקביל.
   * @throws ConnectionError כאשר המתאר הראשי אינו זמין או פגום.
   */
  async discover(options: DiscoverOptions): Promise<void> {
    const discovered: DiscoveredDescription[] = [];

    try {
      discovered.push({ description: await this.loadDescription(options.primary), source: options.primary });
    } catch (error) {
      if (error instanceof ConnectionError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(`Unable to load primary description '${options.primary}': ${message}`, { cause: error });
    }

    for (const source of options.additional ?? []) {
      try {
        discovered.push({ description: await this.loadDescription(source), source });
      } catch (error) {
        if (!(error instanceof ResourceError)) {
          throw error;
        }
        this.logger.info(`[discover] skipping unavailable description '${source}': ${error.message}`);
      }
    }

    await this.loadSchemas(discovered, options.baseUrl);

    const services = new Map<string, Service>();
    for (const { description } of discovered) {
      for (const [name, service] of description.services) {
        if (services.has(name)) {
          this.logger.debug(`[discover] service '${name}' already registered, keeping the first one`);
          continue;
        }
        services.set(name, service);
      }
    }

    this._descriptions = discovered.map(entry => entry.description);
    this._services = services;
    this.logger.info(`[discover] ${services.size} services from ${discovered.length} description(s)`);
  }

  private async loadDescription(source: string): Promise<Description> {
    const xml = await loadSource(source, this.http);
    return parseDeviceDescription(xml, this.logger);
  }

  /**
   * @hebrew מחשב את מקור מסמך ה-SCPD של שירות, יחסית למקור המתאר.
   * @returns null כאשר אין בסיס לפתרון כתובת יחסית.
   */
  resolveSchemaSource(scpdUrl: string, descriptionSource: string, baseUrl?: string): string | null {
    if (isUrlSource(scpdUrl)) {
      return scpdUrl;
    }
    if (isUrlSource(descriptionSource)) {
      return new URL(scpdUrl, descriptionSource).toString();
    }
    if (isXmlSource(descriptionSource)) {
      return baseUrl ? new URL(scpdUrl, baseUrl).toString() : null;
    }
    return path.join(path.dirname(descriptionSource), scpdUrl.replace(/^\/+/, ''));
  }

  private async loadSchemas(discovered: DiscoveredDescription[], baseUrl?: string): Promise<void> {
    const jobs: Array<{ service: Service; source: string | null }> = [];
    for (const { description, source } of discovered) {
      for (const service of description.services.values()) {
        jobs.push({ service, source: this.resolveSchemaSource(service.SCPDURL, source, baseUrl) });
      }
    }

    const results = await Promise.allSettled(jobs.map(async ({ service, source }) => {
      if (source === null) {
        throw new ResourceError(`No base location to resolve '${service.SCPDURL}'`);
      }
      const xml = await loadSource(source, this.http);
      return parseServiceSchema(xml, this.logger, service.name);
    }));

    results.forEach((result, index) => {
      const { service } = jobs[index];
      if (result.status === 'fulfilled') {
        service.attachSchema(result.value);
      } else {
        const reason: unknown = result.reason;
        const message = reason instanceof Error ? reason.message : String(reason);
        this.logger.warn(`[loadSchemas] service '${service.name}' has no actions: ${message}`);
      }
    });
  }

  /**
   * @hebrew מייצא את מצב הגילוי לאובייקט JSON (למטמון).
   */
  serialize(): ApiSnapshot {
    return { descriptions: this._descriptions.map(description => description.toJSON()) };
  }

  /**
   * @hebrew משחזר את מצב הגילוי מאובייקט שנוצר ב-serialize.
   * @throws CacheError כאשר המבנה אינו מוכר.
   */
  restore(snapshot: unknown): void {
    if (!isApiSnapshot(snapshot)) {
      throw new CacheError('Unknown cache format');
    }
    let descriptions: Description[];
    try {
      descriptions = snapshot.descriptions.map(Description.fromJSON);
    } catch (error) {
      throw new CacheError('Unknown cache format', { cause: error });
    }
    const services = new Map<string, Service>();
    for (const description of descriptions) {
      for (const [name, service] of description.services) {
        if (!services.has(name)) {
          services.set(name, service);
        }
      }
    }
    this._descriptions = descriptions;
    this._services = services;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function isDescriptionJson(value: unknown): value is DescriptionJson {
  if (!isRecord(value) || !isRecord(value.device)) {
    return false;
  }
  return Array.isArray(value.device.services) && Array.isArray(value.device.devices);
}

export function isApiSnapshot(value: unknown): value is ApiSnapshot {
  return isRecord(value) && Array.isArray(value.descriptions) && value.descriptions.every(isDescriptionJson);
}
