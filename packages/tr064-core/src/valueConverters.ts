import type { ActionInputValue, ActionValue } from './types';

/*
 * המרת ערכי טקסט מתשובות SOAP לפי טיפוס משתנה המצב.
 * כל ממיר זורק RangeError על ערך שאינו תואם; getConvertedValue תופס ומחזיר את הטקסט המקורי,
 * משום שהקושחה של הנתב לא תמיד עקבית עם הטיפוסים המוצהרים.
 */

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

export function integerConvert(value: string): number {
  const text = value.trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new RangeError(`value '${value}' is not an integer`);
  }
  const result = parseInt(text, 10);
  // ui8/i8 מעבר ל-2^53 אינם ניתנים לייצוג מדויק ב-number
  if (!Number.isSafeInteger(result)) {
    throw new RangeError(`value '${value}' exceeds the safe integer range`);
  }
  return result;
}

/**
 * @hebrew רק "1" ו-"0" הם ערכים בוליאניים תקינים של הפרוטוקול.
 */
export function booleanConvert(value: string): boolean {
  const text = value.trim();
  if (text === '1' || text === '0') {
    return text === '1';
  }
  throw new RangeError(`value '${value}' does not match '1' or '0'`);
}

/**
 * @hebrew ממיר "YYYY-MM-DDTHH:MM:SS" ל-Date בזמן מקומי. תאריך לא קיים (למשל 2021-02-30) נדחה.
 */
export function datetimeConvert(value: string): Date {
  const match = DATETIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new RangeError(`value '${value}' does not match YYYY-MM-DDTHH:MM:SS`);
  }
  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(part => parseInt(part, 10));
  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day
    || date.getHours() !== hours || date.getMinutes() !== minutes || date.getSeconds() !== seconds) {
    throw new RangeError(`value '${value}' is not a valid date`);
  }
  return date;
}

// מסיר קידומת כמו "uuid:"
export function uuidConvert(value: string): string {
  const segments = value.split(':');
  return segments[segments.length - 1] ?? value;
}

type Converter = (value: string) => ActionValue;

export const CONVERSION_TABLE: ReadonlyMap<string, Converter> = new Map<string, Converter>([
  ['datetime', datetimeConvert],
  ['boolean', booleanConvert],
  ['uuid', uuidConvert],
  ['ui1', integerConvert],
  ['ui2', integerConvert],
  ['ui4', integerConvert],
  ['ui8', integerConvert],
  ['i1', integerConvert],
  ['i2', integerConvert],
  ['i4', integerConvert],
  ['i8', integerConvert],
  ['int', integerConvert],
]);

/**
 * @hebrew ממיר ערך טקסט לפי טיפוס הנתונים. טיפוס לא מוכר, או ערך שההמרה שלו נכשלה, מוחזר כטקסט.
 * @param dataType - טיפוס הנתונים של משתנה המצב (לא תלוי רישיות), או undefined אם אינו ידוע.
 */
export function getConvertedValue(dataType: string | undefined, value: string): ActionValue {
  const converter = dataType === undefined ? undefined : CONVERSION_TABLE.get(dataType.toLowerCase());
  if (!converter) {
    return value;
  }
  try {
    return converter(value);
  } catch {
    return value;
  }
}

/**
 * @hebrew מקודד ערך קלט לפעולה: true ל-1, false/null/undefined ל-0, וכל ערך אחר כמחרוזת.
 */
export function encodeArgumentValue(value: ActionInputValue): string {
  if (value === true) return '1';
  if (value === false || value === null || value === undefined) return '0';
  return String(value);
}
