import * as xml2js from 'xml2js';

/**
 * ערך שמחזיר xml2js עם explicitArray=false: מחרוזת לאלמנט טקסט,
 * אובייקט לאלמנט עם ילדים או מאפיינים, ומערך כאשר אלמנט חוזר על עצמו.
 * מאפיינים נמצאים תחת '$' וטקסט של אלמנט עם מאפיינים תחת '_'.
 */
export type XmlValue = string | XmlNode | XmlValue[];
export interface XmlNode {
  [name: string]: XmlValue;
}

export interface ParseXmlOptions {
  // false: טקסט של אלמנטים נשמר עם רווחים בתחילתו ובסופו
  trim?: boolean;
}

/**
 * @hebrew מנתח מחרוזת XML עם הגדרות הפרסר האחידות של הספרייה: ללא מערכים מפורשים,
 * ללא אלמנט שורש מפורש, וללא קידומות namespace בשמות התגיות.
 * @throws שגיאת xml2js כאשר המסמך אינו XML תקין.
 */
export async function parseXml(xml: string, options: ParseXmlOptions = {}): Promise<XmlNode> {
  const parser = new xml2js.Parser({
    explicitArray: false,
    explicitRoot: false,
    trim: options.trim ?? true,
    tagNameProcessors: [xml2js.processors.stripPrefix],
  });
  const parsed: unknown = await parser.parseStringPromise(xml);
  if (isXmlNode(parsed)) {
    return parsed;
  }
  // מסמך ששורשו מכיל טקסט בלבד
  return typeof parsed === 'string' ? { _: parsed } : {};
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * @hebrew מחזיר את הטקסט של ערך XML: מחרוזת כפי שהיא, או תוכן '_' של אלמנט עם מאפיינים.
 */
export function textOf(value: XmlValue | undefined): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? textOf(value[0]) : '';
  }
  if (value && typeof value._ === 'string') {
    return value._.trim();
  }
  return '';
}

/**
 * @hebrew כמו textOf, אך ללא הסרת רווחים. לערכים שנותחו עם trim: false.
 */
export function rawTextOf(value: XmlValue | undefined): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? rawTextOf(value[0]) : '';
  }
  if (value && typeof value._ === 'string') {
    return value._;
  }
  return '';
}

/** מחזיר את הילד הראשון בשם הנתון כאובייקט, או null. */
export function childNode(node: XmlNode, name: string): XmlNode | null {
  const value = node[name];
  const first = Array.isArray(value) ? value[0] : value;
  return isXmlNode(first) ? first : null;
}

/** מחזיר את כל הילדים בשם הנתון שהם אובייקטים, לפי סדר המסמך. */
export function childNodes(node: XmlNode, name: string): XmlNode[] {
  const value = node[name];
  const items = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return items.filter(isXmlNode);
}

/** הטקסט של הילד הראשון בשם הנתון, או undefined אם אין כזה. */
export function childText(node: XmlNode, name: string): string | undefined {
  return name in node ? textOf(node[name]) : undefined;
}

/** מאפיין של אלמנט (מתוך '$'). */
export function attributeOf(value: XmlValue | undefined, name: string): string | undefined {
  if (!isXmlNode(value)) return undefined;
  const attributes = value.$;
  if (!isXmlNode(attributes)) return undefined;
  const attribute = attributes[name];
  return typeof attribute === 'string' ? attribute : undefined;
}

/**
 * @hebrew מחפש רקורסיבית (לעומק, לפי סדר המסמך) את האלמנט הראשון בשם הנתון, בכל רמת קינון.
 * @returns הערך הגולמי של האלמנט, או undefined אם לא נמצא.
 */
export function findElement(node: XmlValue, name: string): XmlValue | undefined {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findElement(item, name);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  if (!isXmlNode(node)) {
    return undefined;
  }
  if (name in node && name !== '$') {
    const value = node[name];
    return Array.isArray(value) ? value[0] : value;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key === '$' || key === '_') continue;
    const found = findElement(value, name);
    if (found !== undefined) return found;
  }
  return undefined;
}
