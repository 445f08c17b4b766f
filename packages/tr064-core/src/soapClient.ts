// קובץ זה מכיל את הלוגיקה לבניית בקשות SOAP, שליחתן ופענוח התשובות.
import { create } from 'xmlbuilder2';
import { createNullLogger, type ModuleLogger } from './logger';
import { ConnectionError, errorFromResponse } from './errors';
import type { HttpTransport } from './httpClient';
import type { Service } from './descriptionModel';
import type { ActionArguments, ActionResult } from './types';
import { encodeArgumentValue, getConvertedValue } from './valueConverters';
import { childNode, findElement, parseXml, rawTextOf, type XmlNode } from './xmlUtils';

export const SOAP_ENV_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
export const SOAP_ENC_NS = 'http://schemas.xmlsoap.org/soap/encoding/';

/**
 * @hebrew בונה מעטפת SOAP מלאה באמצעות xmlbuilder2. הארגומנטים נכתבים לפי סדר הקריאה,
 * ותווים מיוחדים מוברחים על ידי ה-serializer.
 * @param serviceType - ה-URN של סוג השירות (namespace של הפעולה).
 * @param actionName - שם הפעולה.
 * @param args - ארגומנטי הקלט.
 * @returns מחרוזת XML של המעטפת.
 */
export function buildSoapEnvelope(serviceType: string, actionName: string, args: ActionArguments = {}): string {
  const root = create({ version: '1.0', encoding: 'utf-8' })
    .ele('s:Envelope', { 'xmlns:s': SOAP_ENV_NS, 's:encodingStyle': SOAP_ENC_NS });
  const actionElement = root.ele('s:Body').ele(`u:${actionName}`, { 'xmlns:u': serviceType });
  for (const [name, value] of Object.entries(args)) {
    actionElement.ele(name).txt(encodeArgumentValue(value));
  }
  return root.end({ prettyPrint: false });
}

export interface SoapClientOptions {
  http: HttpTransport;
  // למשל http://192.168.178.1:49000
  baseUrl: string;
  logger?: ModuleLogger;
}

/**
 * @hebrew מבצע פעולות של שירות מול ההתקן. אינו מנסה שוב: כל כשל מועבר לקורא כשגיאה מסווגת.
 */
export class SoapClient {
  readonly baseUrl: string;
  private readonly http: HttpTransport;
  private readonly logger: ModuleLogger;

  constructor(options: SoapClientOptions) {
    this.http = options.http;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.logger = options.logger ?? createNullLogger();
  }

  /**
   * @hebrew שולח פעולה לשירות ומחזיר את הארגומנטים היוצאים שנמצאו בתשובה, אחרי המרת טיפוס.
   * ארגומנט יוצא שחסר בתשובה מושמט מהתוצאה.
   * @param service - השירות (נקודת הבקרה וסוג השירות נלקחים ממנו).
   * @param actionName - שם הפעולה. קיום הפעולה בסכמה הוא באחריות הקורא.
   * @param args - ארגומנטי הקלט, בסדר שבו ייכתבו למעטפת.
   * @throws ProtocolError (או תת-מחלקה) עבור SOAP Fault, AuthorizationError או ConnectionError.
   */
  async invoke(service: Service, actionName: string, args: ActionArguments = {}): Promise<ActionResult> {
    const url = `${this.baseUrl}${service.controlURL}`;
    const envelope = buildSoapEnvelope(service.serviceType, actionName, args);
    this.logger.debug(`[invoke] ${service.name}.${actionName} -> ${url}`);
    this.logger.trace(`[invoke] envelope: ${envelope}`);

    const response = await this.http.post(url, envelope, {
      'Content-Type': 'text/xml; charset="utf-8"',
      'SOAPAction': `"${service.serviceType}#${actionName}"`,
    });
    this.logger.debug(`[invoke] response status: ${response.status}`);
    this.logger.trace(`[invoke] response body: ${response.body}`);

    if (response.status !== 200) {
      const error = await errorFromResponse(response.status, response.body);
      this.logger.warn(`[invoke] ${service.name}.${actionName} failed: ${error.name}: ${error.message}`);
      throw error;
    }
    return this.parseResponse(service, actionName, response.body);
  }

  /**
   * @hebrew מחלץ מתשובת SOAP את הערכים של כל ארגומנט יוצא של הפעולה.
   */
  async parseResponse(service: Service, actionName: string, body: string): Promise<ActionResult> {
    let root: XmlNode;
    try {
      root = await parseXml(body, { trim: false });
    } catch (error) {
      throw new ConnectionError(`Malformed response for '${service.name}.${actionName}'`, { cause: error });
    }
    const bodyNode = childNode(root, 'Body') ?? root;

    const action = service.getAction(actionName);
    if (!action) {
      this.logger.warn(`[parseResponse] action '${actionName}' is not part of the schema of '${service.name}', no arguments extracted`);
      return {};
    }

    const result: ActionResult = {};
    for (const argument of action.outArguments) {
      const element = findElement(bodyNode, argument.name);
      if (element === undefined) {
        continue;
      }
      const dataType = service.resolveDataType(argument);
      result[argument.name] = getConvertedValue(dataType, rawTextOf(element));
    }
    return result;
  }
}
