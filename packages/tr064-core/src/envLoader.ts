import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { booleanFromString } from './utils';

/**
 * @hebrew טוען קובץ .env אם הוא קיים.
 * @param filePath - נתיב הקובץ.
 * @param override - האם לדרוס משתנים שכבר מוגדרים בסביבה.
 */
export const loadEnvFile = (filePath: string, override: boolean = false): void => {
  if (!fs.existsSync(filePath)) {
    return;
  }
  const result = dotenv.config({ path: filePath, override });
  if (result.error) {
    console.warn(`[EnvLoader] Error loading .env file from ${filePath}:`, result.error.message);
  }
};

/**
 * בודק אם מחרוזת ניתנת להמרה למספר ללא איבוד מידע.
 * "007" ו-"1e3" נשארים מחרוזות; "12" ו-"1.5" מומרים.
 */
export function isStringLosslesslyNumeric(value: unknown): boolean {
  if (typeof value !== 'string' || value.trim() === '') {
    return false;
  }
  const num = Number(value);
  if (!isFinite(num)) {
    return false;
  }
  return String(num) === value;
}

export type EnvValue = string | number | boolean | undefined;

/**
 * @hebrew מעבד משתני סביבה: מספרים מומרים ללא איבוד מידע, טוקנים בוליאניים מומרים לבוליאני.
 * @param source - ברירת מחדל: process.env.
 */
export const getProcessedEnv = (source: NodeJS.ProcessEnv = process.env): Record<string, EnvValue> => {
  const processed: Record<string, EnvValue> = {};
  for (const [key, value] of Object.entries(source)) {
    if (isStringLosslesslyNumeric(value)) {
      processed[key] = Number(value);
    } else if (value !== undefined && /^(true|false|on|off)$/i.test(value.trim())) {
      processed[key] = booleanFromString(value);
    } else {
      processed[key] = value;
    }
  }
  return processed;
};

/**
 * @hebrew טוען את קובץ ה-.env מתיקיית העבודה ואחריו (עם דריסה) קובץ מפורש אם הועבר.
 */
export const loadEnv = (explicitPath?: string): Record<string, EnvValue> => {
  loadEnvFile(path.resolve(process.cwd(), '.env'));
  if (explicitPath) {
    loadEnvFile(path.resolve(explicitPath), true);
  }
  return getProcessedEnv();
};
