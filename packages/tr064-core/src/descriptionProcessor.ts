import { promises as fs } from 'fs';
import { createNullLogger, type ModuleLogger } from './logger';
import { ConnectionError, ResourceError } from './errors';
import type { HttpTransport } from './httpClient';
import { Action, Description, Device, Service, ServiceSchema } from './descriptionModel';
import type {
  ActionArgument,
  AllowedValueRange,
  DeviceInfo,
  ServiceInfo,
  SpecVersion,
  StateVariable,
  SystemVersion,
} from './types';
import { attributeOf, childNode, childNodes, childText, parseXml, textOf, type XmlNode } from './xmlUtils';
import { booleanFromString, toArray } from './utils';

const DEVICE_INFO_FIELDS: readonly (keyof DeviceInfo)[] = [
  'deviceType', 'friendlyName', 'manufacturer', 'manufacturerURL', 'modelDescription',
  'modelName', 'modelNumber', 'modelURL', 'UDN', 'UPC', 'presentationURL',
];
const SERVICE_INFO_FIELDS: readonly (keyof ServiceInfo)[] = ['serviceType', 'serviceId', 'controlURL', 'eventSubURL', 'SCPDURL'];

// אלמנטים מוכרים שאינם שדות טקסט של הרשומה
const DEVICE_CONTAINERS = new Set(['serviceList', 'deviceList', 'iconList']);
const DESCRIPTION_ELEMENTS = new Set(['specVersion', 'systemVersion', 'device', 'URLBase']);
const SCPD_ELEMENTS = new Set(['specVersion', 'actionList', 'serviceStateTable']);
const IGNORED_KEYS = new Set(['$', '_']);

/**
 * @hebrew רושם ברמת trace אלמנטים שאינם חלק מהרשומה המוכרת.
 */
function logUnknownElements(node: XmlNode, known: ReadonlySet<string>, context: string, logger: ModuleLogger): void {
  for (const name of Object.keys(node)) {
    if (!known.has(name) && !IGNORED_KEYS.has(name)) {
      logger.trace(`[${context}] ignoring unknown element '${name}'`);
    }
  }
}

function parseSpecVersion(node: XmlNode): SpecVersion | null {
  const spec = childNode(node, 'specVersion');
  if (!spec) return null;
  return {
    major: parseInt(childText(spec, 'major') ?? '', 10) || 0,
    minor: parseInt(childText(spec, 'minor') ?? '', 10) || 0,
  };
}

function parseSystemVersion(node: XmlNode): SystemVersion | null {
  const version = childNode(node, 'systemVersion');
  if (!version) return null;
  return {
    hardwareCode: childText(version, 'HW') ?? '',
    major: childText(version, 'Major') ?? '',
    minor: childText(version, 'Minor') ?? '',
    patch: childText(version, 'Patch') ?? '',
    buildNumber: childText(version, 'Buildnumber') ?? '',
    display: childText(version, 'Display') ?? '',
  };
}

function parseService(node: XmlNode, logger: ModuleLogger): Service {
  logUnknownElements(node, new Set<string>(SERVICE_INFO_FIELDS), 'parseService', logger);
  const info: ServiceInfo = { serviceType: '', serviceId: '', controlURL: '', eventSubURL: '', SCPDURL: '' };
  for (const field of SERVICE_INFO_FIELDS) {
    info[field] = childText(node, field) ?? '';
  }
  return new Service(info);
}

/**
 * @hebrew בונה התקן ואת כל התקני-המשנה שלו באופן רקורסיבי.
 */
function parseDevice(node: XmlNode, logger: ModuleLogger): Device {
  const known = new Set<string>([...DEVICE_INFO_FIELDS, ...DEVICE_CONTAINERS]);
  logUnknownElements(node, known, 'parseDevice', logger);

  const info: Partial<DeviceInfo> = {};
  for (const field of DEVICE_INFO_FIELDS) {
    const value = childText(node, field);
    if (value !== undefined) {
      info[field] = value;
    }
  }
  const serviceList = childNode(node, 'serviceList');
  const services = serviceList ? childNodes(serviceList, 'service').map(service => parseService(service, logger)) : [];
  const deviceList = childNode(node, 'deviceList');
  const devices = deviceList ? childNodes(deviceList, 'device').map(device => parseDevice(device, logger)) : [];
  return new Device(info, services, devices);
}

/**
 * @hebrew מנתח מסמך מתאר התקן (tr64desc.xml / igddesc.xml) לאובייקט Description.
 * @param xml - תוכן המסמך.
 * @throws ConnectionError אם המסמך אינו XML תקין או שאין בו אלמנט device.
 */
export async function parseDeviceDescription(xml: string, logger: ModuleLogger = createNullLogger()): Promise<Description> {
  let root: XmlNode;
  try {
    root = await parseXml(xml);
  } catch (error) {
    throw new ConnectionError('Malformed device description', { cause: error });
  }
  const deviceNode = childNode(root, 'device');
  if (!deviceNode) {
    throw new ConnectionError('Device description without a <device> element');
  }
  logUnknownElements(root, DESCRIPTION_ELEMENTS, 'parseDeviceDescription', logger);
  return new Description(parseDevice(deviceNode, logger), parseSpecVersion(root), parseSystemVersion(root));
}

function parseArgument(node: XmlNode): ActionArgument {
  const direction = (childText(node, 'direction') ?? '').toLowerCase();
  return {
    name: childText(node, 'name') ?? '',
    direction: direction === 'out' ? 'out' : 'in',
    relatedStateVariable: childText(node, 'relatedStateVariable') ?? '',
  };
}

function parseAction(node: XmlNode): Action {
  const argumentList = childNode(node, 'argumentList');
  const args = argumentList ? childNodes(argumentList, 'argument').map(parseArgument) : [];
  return new Action(childText(node, 'name') ?? '', args);
}

function parseStateVariable(node: XmlNode): StateVariable {
  const variable: StateVariable = {
    name: childText(node, 'name') ?? '',
    dataType: childText(node, 'dataType') ?? 'string',
    allowedValues: [],
  };
  const defaultValue = childText(node, 'defaultValue');
  if (defaultValue !== undefined) {
    variable.defaultValue = defaultValue;
  }
  const allowedValueList = childNode(node, 'allowedValueList');
  if (allowedValueList) {
    variable.allowedValues = toArray(allowedValueList.allowedValue).map(value => textOf(value));
  }
  const range = childNode(node, 'allowedValueRange');
  if (range) {
    const allowedValueRange: AllowedValueRange = {
      minimum: childText(range, 'minimum') ?? '',
      maximum: childText(range, 'maximum') ?? '',
    };
    const step = childText(range, 'step');
    if (step !== undefined) {
      allowedValueRange.step = step;
    }
    variable.allowedValueRange = allowedValueRange;
  }
  const sendEvents = attributeOf(node, 'sendEvents');
  if (sendEvents !== undefined) {
    variable.sendEvents = booleanFromString(sendEvents) ?? false;
  }
  return variable;
}

/**
 * @hebrew מנתח מסמך SCPD (תיאור הפעולות של שירות) לסכמה.
 * ארגומנט שמשתנה המצב שלו לא מוגדר נרשם כפגם בסכמה; ערכו יוחזר כטקסט גולמי.
 * @param xml - תוכן המסמך.
 * @param serviceName - לשם רישום בלוג בלבד.
 * @throws ResourceError אם המסמך אינו XML תקין.
 */
export async function parseServiceSchema(xml: string, logger: ModuleLogger = createNullLogger(), serviceName: string = ''): Promise<ServiceSchema> {
  let root: XmlNode;
  try {
    root = await parseXml(xml);
  } catch (error) {
    throw new ResourceError(`Malformed service description${serviceName ? ` for '${serviceName}'` : ''}`, { cause: error });
  }
  logUnknownElements(root, SCPD_ELEMENTS, 'parseServiceSchema', logger);

  const actionList = childNode(root, 'actionList');
  const actions = actionList ? childNodes(actionList, 'action').map(parseAction) : [];
  const stateTable = childNode(root, 'serviceStateTable');
  const stateVariables = stateTable ? childNodes(stateTable, 'stateVariable').map(parseStateVariable) : [];

  const schema = new ServiceSchema(actions, stateVariables, parseSpecVersion(root));
  for (const { action, argument } of schema.unresolvedArguments()) {
    logger.warn(`[parseServiceSchema] ${serviceName || 'service'}.${action}: argument '${argument.name}' refers to unknown state variable '${argument.relatedStateVariable}'`);
  }
  return schema;
}

export const isUrlSource = (source: string): boolean => /^https?:\/\//i.test(source);
export const isXmlSource = (source: string): boolean => source.trimStart().startsWith('<');

/**
 * @hebrew טוען מקור מסמך: כתובת http(s), מחרוזת XML, או נתיב לקובץ.
 * @throws ResourceError כאשר המסמך אינו זמין (סטטוס שאינו 200, תשובת HTML או קובץ חסר).
 */
export async function loadSource(source: string, http: HttpTransport): Promise<string> {
  if (isXmlSource(source)) {
    return source;
  }
  if (isUrlSource(source)) {
    const response = await http.get(source);
    if (response.status !== 200) {
      throw new ResourceError(`Resource '${source}' not available (HTTP ${response.status})`);
    }
    if (response.contentType.toLowerCase().includes('text/html')) {
      throw new ResourceError(`Resource '${source}' not available (unexpected HTML answer)`);
    }
    return response.body;
  }
  try {
    return await fs.readFile(source, 'utf-8');
  } catch (error) {
    throw new ResourceError(`Resource '${source}' not available`, { cause: error });
  }
}
