import { childNode, isXmlNode, parseXml, textOf, type XmlNode } from './xmlUtils';

/**
 * תגיות סוגי השגיאה. מאפשרות התאמה לפי סוג בלי השוואת מחרוזות הודעה
 * ובלי תלות בשרשרת instanceof.
 */
export type ErrorKind =
  | 'connection'
  | 'authorization'
  | 'resource'
  | 'cache'
  | 'serviceNotFound'
  | 'actionNotFound'
  | 'protocol'
  | 'invalidAction'
  | 'invalidArgument'
  | 'invalidArgumentValue'
  | 'argumentStringTooShort'
  | 'argumentStringTooLong'
  | 'invalidCharacter'
  | 'internalDevice'
  | 'actionFailed'
  | 'outOfMemory'
  | 'security'
  | 'arrayIndex'
  | 'lookup';

export interface Tr064ErrorOptions {
  cause?: unknown;
}

/**
 * @hebrew מחלקת הבסיס לכל השגיאות של הספרייה.
 */
export class Tr064Error extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind = 'connection', options: Tr064ErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** כשל בהתחברות, התקן לא זמין או מתאר ראשי פגום. */
export class ConnectionError extends Tr064Error {
  constructor(message: string, options: Tr064ErrorOptions = {}) {
    super(message, 'connection', options);
  }
}

/** דחייה ברמת HTTP (401 עם דף HTML), להבדיל מ-SecurityError ברמת הפרוטוקול. */
export class AuthorizationError extends Tr064Error {
  constructor(message: string, options: Tr064ErrorOptions = {}) {
    super(message, 'authorization', options);
  }
}

/** מסמך מתאר שאינו זמין. קטלני רק עבור המתאר הראשי. */
export class ResourceError extends Tr064Error {
  constructor(message: string, options: Tr064ErrorOptions = {}) {
    super(message, 'resource', options);
  }
}

export class CacheError extends Tr064Error {
  constructor(message: string, options: Tr064ErrorOptions = {}) {
    super(message, 'cache', options);
  }
}

export class ServiceNotFoundError extends Tr064Error {
  readonly serviceName: string;

  constructor(serviceName: string) {
    super(`Unknown service: '${serviceName}'`, 'serviceNotFound');
    this.serviceName = serviceName;
  }
}

export class ActionNotFoundError extends Tr064Error {
  readonly serviceName: string;
  readonly actionName: string;

  constructor(serviceName: string, actionName: string) {
    super(`Unknown action '${actionName}' for service '${serviceName}'`, 'actionNotFound');
    this.serviceName = serviceName;
    this.actionName = actionName;
  }
}

/**
 * @hebrew שגיאה שהתקן דיווח עליה בתשובת SOAP Fault. נושאת את קוד השגיאה ותיאורה הגולמי.
 */
export class ProtocolError extends Tr064Error {
  readonly errorCode: number | null;
  readonly errorDescription: string | null;

  constructor(message: string, errorCode: number | null = null, errorDescription: string | null = null, kind: ErrorKind = 'protocol') {
    super(message, kind);
    this.errorCode = errorCode;
    this.errorDescription = errorDescription;
  }
}

export class InvalidActionError extends ProtocolError {
  constructor(message: string, code: number | null = 401, description: string | null = null) {
    super(message, code, description, 'invalidAction');
  }
}

export class ArgumentError extends ProtocolError {
  constructor(message: string, code: number | null = 402, description: string | null = null, kind: ErrorKind = 'invalidArgument') {
    super(message, code, description, kind);
  }
}

export class ArgumentValueError extends ArgumentError {
  constructor(message: string, code: number | null = 600, description: string | null = null, kind: ErrorKind = 'invalidArgumentValue') {
    super(message, code, description, kind);
  }
}

export class ArgumentStringTooShortError extends ArgumentValueError {
  constructor(message: string, code: number | null = 801, description: string | null = null) {
    super(message, code, description, 'argumentStringTooShort');
  }
}

export class ArgumentStringTooLongError extends ArgumentValueError {
  constructor(message: string, code: number | null = 802, description: string | null = null) {
    super(message, code, description, 'argumentStringTooLong');
  }
}

export class ArgumentCharacterError extends ArgumentValueError {
  constructor(message: string, code: number | null = 803, description: string | null = null) {
    super(message, code, description, 'invalidCharacter');
  }
}

export class InternalDeviceError extends ProtocolError {
  constructor(message: string, code: number | null = 820, description: string | null = null, kind: ErrorKind = 'internalDevice') {
    super(message, code, description, kind);
  }
}

export class ActionFailedError extends InternalDeviceError {
  constructor(message: string, code: number | null = 501, description: string | null = null) {
    super(message, code, description, 'actionFailed');
  }
}

export class OutOfMemoryError extends InternalDeviceError {
  constructor(message: string, code: number | null = 603, description: string | null = null) {
    super(message, code, description, 'outOfMemory');
  }
}

export class SecurityError extends ProtocolError {
  constructor(message: string, code: number | null = 606, description: string | null = null) {
    super(message, code, description, 'security');
  }
}

export class ArrayIndexError extends ProtocolError {
  constructor(message: string, code: number | null = 713, description: string | null = null) {
    super(message, code, description, 'arrayIndex');
  }
}

export class LookupError extends ProtocolError {
  constructor(message: string, code: number | null = 714, description: string | null = null) {
    super(message, code, description, 'lookup');
  }
}

type ProtocolErrorClass = new (message: string, errorCode?: number | null, errorDescription?: string | null) => ProtocolError;
interface ErrorTableEntry {
  kind: ErrorKind;
  ctor: ProtocolErrorClass;
}

// טבלת קודי השגיאה של הפרוטוקול
const ERROR_TABLE: ReadonlyMap<number, ErrorTableEntry> = new Map<number, ErrorTableEntry>([
  [401, { kind: 'invalidAction', ctor: InvalidActionError }],
  [402, { kind: 'invalidArgument', ctor: ArgumentError }],
  [501, { kind: 'actionFailed', ctor: ActionFailedError }],
  [600, { kind: 'invalidArgumentValue', ctor: ArgumentValueError }],
  [603, { kind: 'outOfMemory', ctor: OutOfMemoryError }],
  [606, { kind: 'security', ctor: SecurityError }],
  [713, { kind: 'arrayIndex', ctor: ArrayIndexError }],
  [714, { kind: 'lookup', ctor: LookupError }],
  [801, { kind: 'argumentStringTooShort', ctor: ArgumentStringTooShortError }],
  [802, { kind: 'argumentStringTooLong', ctor: ArgumentStringTooLongError }],
  [803, { kind: 'invalidCharacter', ctor: ArgumentCharacterError }],
  [820, { kind: 'internalDevice', ctor: InternalDeviceError }],
]);

export const KNOWN_ERROR_CODES: readonly number[] = [...ERROR_TABLE.keys()];

/**
 * @hebrew ממפה קוד שגיאה של הפרוטוקול לסוג שגיאה. קוד לא מוכר ממופה ל-'protocol'.
 */
export function mapErrorCode(code: number | string | null | undefined): ErrorKind {
  const numeric = typeof code === 'string' ? parseInt(code, 10) : code;
  if (numeric === null || numeric === undefined || Number.isNaN(numeric)) {
    return 'protocol';
  }
  return ERROR_TABLE.get(numeric)?.kind ?? 'protocol';
}

/**
 * @hebrew בונה את מחלקת השגיאה המתאימה לקוד.
 */
export function createProtocolError(code: number | null, message: string, description: string | null = null): ProtocolError {
  const entry = code === null ? undefined : ERROR_TABLE.get(code);
  if (!entry) {
    return new ProtocolError(message, code, description);
  }
  return new entry.ctor(message, code, description);
}

/** תחליף לירושה מ-IndexError: האם זו שגיאת אינדקס מחוץ לטווח. */
export function isIndexError(error: unknown): error is ArrayIndexError {
  return error instanceof Tr064Error && error.kind === 'arrayIndex';
}

/** תחליף לירושה מ-KeyError: האם זו שגיאת חיפוש (ערך לא נמצא). */
export function isLookupError(error: unknown): error is LookupError {
  return error instanceof Tr064Error && error.kind === 'lookup';
}

export function isTr064Error(error: unknown): error is Tr064Error {
  return error instanceof Tr064Error;
}

const STATUS_UNAUTHORIZED = 401;

/**
 * @hebrew מסיר תגיות HTML ומכווץ רווחים.
 */
export function removeHtmlTags(text: string): string {
  return text.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ').trim();
}

function collectLeaves(node: XmlNode, lines: string[], state: { code: string | null; description: string | null }): void {
  for (const [name, value] of Object.entries(node)) {
    if (name === '$' || name === '_') continue;
    const items = Array.isArray(value) ? value : [value];
    for (const item of items) {
      if (isXmlNode(item) && Object.keys(item).some(k => k !== '$' && k !== '_')) {
        collectLeaves(item, lines, state);
        continue;
      }
      const text = textOf(item);
      if (name === 'errorCode') state.code = text;
      if (name === 'errorDescription') state.description = text;
      lines.push(`${name}: ${text}`);
    }
  }
}

/**
 * @hebrew מפרש תשובת שגיאה (סטטוס שאינו 200) ומחזיר את השגיאה המתאימה לזריקה.
 * גוף HTML או XML פגום מניב ConnectionError (או AuthorizationError עבור 401);
 * SOAP Fault מניב את השגיאה הממופה לפי errorCode.
 * @param status - קוד סטטוס ה-HTTP.
 * @param body - גוף התשובה הגולמי.
 */
export async function errorFromResponse(status: number, body: string): Promise<Tr064Error> {
  const fromHtml = (text: string) => {
    const message = `Unable to perform operation. ${removeHtmlTags(text)}`.trim();
    return status === STATUS_UNAUTHORIZED ? new AuthorizationError(message) : new ConnectionError(message);
  };

  if (body.trimStart().toLowerCase().startsWith('<html')) {
    return fromHtml(body);
  }

  let parsed: XmlNode;
  try {
    parsed = await parseXml(body);
  } catch {
    return fromHtml(body);
  }

  const bodyNode = childNode(parsed, 'Body') ?? parsed;
  const fault = childNode(bodyNode, 'Fault');
  const detail = fault ? childNode(fault, 'detail') : null;
  if (!detail) {
    const message = `HTTP ${status} without fault detail. ${removeHtmlTags(body)}`.trim();
    return status === STATUS_UNAUTHORIZED ? new AuthorizationError(message) : new ConnectionError(message);
  }

  const lines: string[] = [];
  const state: { code: string | null; description: string | null } = { code: null, description: null };
  collectLeaves(detail, lines, state);
  const code = state.code === null ? null : parseInt(state.code, 10);
  return createProtocolError(code === null || Number.isNaN(code) ? null : code, lines.join('\n'), state.description);
}
