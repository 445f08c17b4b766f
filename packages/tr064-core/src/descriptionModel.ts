import type {
  ActionArgument,
  ActionJson,
  DescriptionJson,
  DeviceInfo,
  DeviceJson,
  ServiceInfo,
  ServiceJson,
  ServiceSchemaJson,
  SpecVersion,
  StateVariable,
  SystemVersion,
} from './types';

/**
 * @hebrew פעולה של שירות: שם ורשימת ארגומנטים מסודרת (שעשויה להיות ריקה).
 */
export class Action {
  readonly name: string;
  readonly arguments: readonly ActionArgument[];
  private readonly argumentIndex: Map<string, ActionArgument>;

  constructor(name: string, args: ActionArgument[] = []) {
    this.name = name;
    this.arguments = [...args];
    this.argumentIndex = new Map(args.map(arg => [arg.name, arg]));
  }

  getArgument(name: string): ActionArgument | undefined {
    return this.argumentIndex.get(name);
  }

  get inArguments(): ActionArgument[] {
    return this.arguments.filter(arg => arg.direction === 'in');
  }

  get outArguments(): ActionArgument[] {
    return this.arguments.filter(arg => arg.direction === 'out');
  }

  toJSON(): ActionJson {
    return { name: this.name, arguments: this.arguments.map(arg => ({ ...arg })) };
  }

  static fromJSON(json: ActionJson): Action {
    return new Action(json.name, json.arguments);
  }
}

/**
 * @hebrew סכמת פעולות של שירות (תוכן מסמך ה-SCPD): טבלת פעולות וטבלת משתני מצב, שתיהן לפי שם.
 */
export class ServiceSchema {
  readonly specVersion: SpecVersion | null;
  readonly actions: ReadonlyMap<string, Action>;
  readonly stateVariables: ReadonlyMap<string, StateVariable>;

  constructor(actions: Action[] = [], stateVariables: StateVariable[] = [], specVersion: SpecVersion | null = null) {
    this.specVersion = specVersion;
    this.actions = new Map(actions.map(action => [action.name, action]));
    this.stateVariables = new Map(stateVariables.map(variable => [variable.name, variable]));
  }

  /**
   * @hebrew מחזיר את טיפוס הנתונים (באותיות קטנות) של ארגומנט, דרך משתנה המצב המקושר אליו.
   * @returns undefined כאשר משתנה המצב לא מוגדר בסכמה.
   */
  resolveDataType(argument: ActionArgument): string | undefined {
    return this.stateVariables.get(argument.relatedStateVariable)?.dataType.toLowerCase();
  }

  /** ארגומנטים שמשתנה המצב שלהם לא מוגדר בסכמה. */
  unresolvedArguments(): Array<{ action: string; argument: ActionArgument }> {
    const result: Array<{ action: string; argument: ActionArgument }> = [];
    for (const action of this.actions.values()) {
      for (const argument of action.arguments) {
        if (!this.stateVariables.has(argument.relatedStateVariable)) {
          result.push({ action: action.name, argument });
        }
      }
    }
    return result;
  }

  static empty(): ServiceSchema {
    return new ServiceSchema();
  }

  toJSON(): ServiceSchemaJson {
    return {
      specVersion: this.specVersion,
      actions: [...this.actions.values()].map(action => action.toJSON()),
      stateVariables: [...this.stateVariables.values()].map(variable => ({ ...variable })),
    };
  }

  static fromJSON(json: ServiceSchemaJson): ServiceSchema {
    return new ServiceSchema(json.actions.map(Action.fromJSON), json.stateVariables, json.specVersion);
  }
}

/**
 * @hebrew שירות של התקן. שמו נגזר מהמקטע האחרון של serviceId (למשל "WANIPConn1").
 * הסכמה מוצמדת פעם אחת בלבד, בזמן הגילוי או בשחזור מהמטמון.
 */
export class Service implements ServiceInfo {
  readonly serviceType: string;
  readonly serviceId: string;
  readonly controlURL: string;
  readonly eventSubURL: string;
  readonly SCPDURL: string;
  private schema: ServiceSchema | null = null;

  constructor(info: ServiceInfo, schema: ServiceSchema | null = null) {
    this.serviceType = info.serviceType;
    this.serviceId = info.serviceId;
    this.controlURL = info.controlURL;
    this.eventSubURL = info.eventSubURL;
    this.SCPDURL = info.SCPDURL;
    this.schema = schema;
  }

  get name(): string {
    const segments = this.serviceId.split(':');
    return segments[segments.length - 1] ?? '';
  }

  get schemaLoaded(): boolean {
    return this.schema !== null;
  }

  attachSchema(schema: ServiceSchema): void {
    if (this.schema !== null) {
      throw new Error(`Schema of service '${this.name}' is already attached`);
    }
    this.schema = schema;
  }

  get actions(): ReadonlyMap<string, Action> {
    return (this.schema ?? ServiceSchema.empty()).actions;
  }

  get stateVariables(): ReadonlyMap<string, StateVariable> {
    return (this.schema ?? ServiceSchema.empty()).stateVariables;
  }

  getAction(name: string): Action | undefined {
    return this.actions.get(name);
  }

  hasAction(name: string): boolean {
    return this.actions.has(name);
  }

  resolveDataType(argument: ActionArgument): string | undefined {
    return this.schema?.resolveDataType(argument);
  }

  toJSON(): ServiceJson {
    return {
      serviceType: this.serviceType,
      serviceId: this.serviceId,
      controlURL: this.controlURL,
      eventSubURL: this.eventSubURL,
      SCPDURL: this.SCPDURL,
      schema: this.schema ? this.schema.toJSON() : null,
    };
  }

  static fromJSON(json: ServiceJson): Service {
    const { schema, ...info } = json;
    return new Service(info, schema ? ServiceSchema.fromJSON(schema) : null);
  }
}

export const EMPTY_DEVICE_INFO: DeviceInfo = {
  deviceType: '',
  friendlyName: '',
  manufacturer: '',
  manufacturerURL: '',
  modelDescription: '',
  modelName: '',
  modelNumber: '',
  modelURL: '',
  UDN: '',
  UPC: '',
  presentationURL: '',
};

/**
 * @hebrew התקן: מאפייני זיהוי, שירותים והתקני-משנה (עץ ללא מעגלים).
 */
export class Device {
  readonly info: DeviceInfo;
  readonly services: readonly Service[];
  readonly devices: readonly Device[];

  constructor(info: Partial<DeviceInfo> = {}, services: Service[] = [], devices: Device[] = []) {
    this.info = { ...EMPTY_DEVICE_INFO, ...info };
    this.services = [...services];
    this.devices = [...devices];
  }

  get deviceType(): string { return this.info.deviceType; }
  get friendlyName(): string { return this.info.friendlyName; }
  get manufacturer(): string { return this.info.manufacturer; }
  get modelName(): string { return this.info.modelName; }
  get UDN(): string { return this.info.UDN; }

  /**
   * @hebrew כל השירותים של ההתקן וכל התקני-המשנה, לעומק: שירותי ההתקן לפני שירותי ילדיו.
   */
  *allServices(): Generator<Service> {
    yield* this.services;
    for (const device of this.devices) {
      yield* device.allServices();
    }
  }

  /**
   * @hebrew מאסף את כל השירותים למפה לפי שם. בהתנגשות שמות השירות הראשון נשמר.
   */
  collectServices(): Map<string, Service> {
    const services = new Map<string, Service>();
    for (const service of this.allServices()) {
      if (!services.has(service.name)) {
        services.set(service.name, service);
      }
    }
    return services;
  }

  toJSON(): DeviceJson {
    return {
      ...this.info,
      services: this.services.map(service => service.toJSON()),
      devices: this.devices.map(device => device.toJSON()),
    };
  }

  static fromJSON(json: DeviceJson): Device {
    const { services, devices, ...info } = json;
    return new Device(info, services.map(Service.fromJSON), devices.map(Device.fromJSON));
  }
}

/**
 * @hebrew מסמך מתאר אחד (למשל tr64desc.xml או igddesc.xml) לאחר ניתוח.
 */
export class Description {
  readonly specVersion: SpecVersion | null;
  readonly systemVersion: SystemVersion | null;
  readonly device: Device;
  readonly services: ReadonlyMap<string, Service>;

  constructor(device: Device, specVersion: SpecVersion | null = null, systemVersion: SystemVersion | null = null) {
    this.device = device;
    this.specVersion = specVersion;
    this.systemVersion = systemVersion;
    this.services = device.collectServices();
  }

  get modelName(): string {
    return this.device.modelName;
  }

  /**
   * @hebrew גרסת המערכת בפורמט "minor.patch" (למשל "7.29"), או null אם אינה ידועה.
   */
  get systemVersionString(): string | null {
    if (this.systemVersion && this.systemVersion.minor && this.systemVersion.patch) {
      return `${this.systemVersion.minor}.${this.systemVersion.patch}`;
    }
    return null;
  }

  /** [hardwareCode, major, minor, patch, buildNumber, display], או null. */
  get systemInfo(): [string, string, string, string, string, string] | null {
    const version = this.systemVersion;
    if (!version) return null;
    return [version.hardwareCode, version.major, version.minor, version.patch, version.buildNumber, version.display];
  }

  toJSON(): DescriptionJson {
    return {
      specVersion: this.specVersion,
      systemVersion: this.systemVersion,
      device: this.device.toJSON(),
    };
  }

  static fromJSON(json: DescriptionJson): Description {
    return new Description(Device.fromJSON(json.device), json.specVersion, json.systemVersion);
  }
}
