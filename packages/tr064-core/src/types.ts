// טיפוסים משותפים לכל חלקי הספרייה

export interface SpecVersion {
  major: number;
  minor: number;
}

/**
 * @hebrew גרסת מערכת ההפעלה של הנתב. קיימת רק במתאר ה-TR-064 (tr64desc.xml).
 */
export interface SystemVersion {
  hardwareCode: string;
  major: string;
  minor: string;
  patch: string;
  buildNumber: string;
  display: string;
}

export interface AllowedValueRange {
  minimum: string;
  maximum: string;
  step?: string;
}

/**
 * @hebrew הגדרת טיפוס משותפת לארגומנטים של פעולות בתוך שירות.
 */
export interface StateVariable {
  name: string;
  dataType: string;
  defaultValue?: string;
  allowedValues: string[];
  allowedValueRange?: AllowedValueRange;
  sendEvents?: boolean;
}

export type ArgumentDirection = 'in' | 'out';

export interface ActionArgument {
  name: string;
  direction: ArgumentDirection;
  relatedStateVariable: string;
}

/** ערך מוחזר מפעולה לאחר המרת טיפוס. */
export type ActionValue = string | number | boolean | Date;

/** תוצאת פעולה: שם ארגומנט יוצא -> ערך, לפי סדר ההגדרה בסכמה. */
export type ActionResult = Record<string, ActionValue>;

/** ערך קלט לפעולה. true/false/null/undefined מקודדים כ-1/0. */
export type ActionInputValue = string | number | boolean | null | undefined;

export type ActionArguments = Record<string, ActionInputValue>;

export interface DeviceInfo {
  deviceType: string;
  friendlyName: string;
  manufacturer: string;
  manufacturerURL: string;
  modelDescription: string;
  modelName: string;
  modelNumber: string;
  modelURL: string;
  UDN: string;
  UPC: string;
  presentationURL: string;
}

/** תיאור שירות כפי שמופיע במתאר ההתקן. */
export interface ServiceInfo {
  serviceType: string;
  serviceId: string;
  controlURL: string;
  eventSubURL: string;
  SCPDURL: string;
}

// --- צורות JSON עבור מטמון הסכמה ---

export interface ActionJson {
  name: string;
  arguments: ActionArgument[];
}

export interface ServiceSchemaJson {
  specVersion: SpecVersion | null;
  actions: ActionJson[];
  stateVariables: StateVariable[];
}

export interface ServiceJson extends ServiceInfo {
  schema: ServiceSchemaJson | null;
}

export interface DeviceJson extends DeviceInfo {
  services: ServiceJson[];
  devices: DeviceJson[];
}

export interface DescriptionJson {
  specVersion: SpecVersion | null;
  systemVersion: SystemVersion | null;
  device: DeviceJson;
}

export interface ApiSnapshot {
  descriptions: DescriptionJson[];
}
