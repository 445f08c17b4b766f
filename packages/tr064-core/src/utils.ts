import { createNullLogger, type ModuleLogger } from './logger';

/**
 * @hebrew פונקציית עזר להמתנה (sleep). ניתנת לביטול באמצעות AbortSignal.
 * @param ms - זמן המתנה במילישניות.
 * @param signal - אות ביטול אופציונלי; בביטול ההבטחה מתממשת מיד.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  logger?: ModuleLogger;
  onRetry?: (error: Error, attempt: number) => void;
  signal?: AbortSignal;
}

/**
 * @hebrew מריץ פונקציה אסינכרונית עם מנגנון ניסיונות חוזרים.
 * @param fn - הפונקציה האסינכרונית להרצה. הפונקציה צריכה לזרוק שגיאה במקרה של כישלון.
 * @param options - אפשרויות התנהגות.
 * @param options.retries - מספר הניסיונות. ברירת מחדל: 3.
 * @param options.delayMs - זמן המתנה בין ניסיונות, או פונקציה שמחשבת אותו לפי מספר הניסיון. ברירת מחדל: 1000.
 * @param options.onRetry - קולבק שנקרא אחרי כל ניסיון שנכשל.
 * @param options.signal - ביטול: ניסיונות נוספים לא יתבצעו אחרי שהאות בוטל.
 * @throws זורק את השגיאה האחרונה אם כל הניסיונות נכשלו.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Omit<RetryOptions, 'delayMs'> & { delayMs?: number | ((attempt: number) => number) } = {}
): Promise<T> {
  const {
    retries = 3,
    delayMs = 1000,
    logger = createNullLogger(),
    onRetry,
    signal,
  } = options;

  let lastError: Error = new Error('retry: no attempt was made');

  for (let attempt = 1; attempt <= retries; attempt++) {
    if (signal?.aborted) {
      break;
    }
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      logger.warn(`Attempt ${attempt} of ${retries} failed: ${lastError.message}`);

      if (onRetry) {
        try {
          onRetry(lastError, attempt);
        } catch (callbackError) {
          logger.error(`Error in onRetry callback: ${callbackError instanceof Error ? callbackError.message : String(callbackError)}`);
        }
      }

      if (attempt < retries) {
        const waitMs = typeof delayMs === 'function' ? delayMs(attempt + 1) : delayMs;
        logger.debug(`Waiting ${waitMs}ms before next retry...`);
        await delay(waitMs, signal);
      }
    }
  }

  logger.error(`All ${retries} attempts failed. Last error: ${lastError.message}`);
  throw lastError;
}

/**
 * @hebrew ממיר ערך בודד או מערך למערך. xml2js מחזיר אובייקט בודד כשיש רק אלמנט אחד.
 */
export function toArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

const TRUE_TOKENS = new Set(['1', 'true', 'on', 'yes']);
const FALSE_TOKENS = new Set(['0', 'false', 'off', 'no']);

/**
 * @hebrew ממיר מחרוזת בסגנון on/off, true/false או 1/0 (ללא תלות ברישיות) לבוליאני.
 * @returns undefined אם המחרוזת אינה אחד הטוקנים המוכרים.
 */
export function booleanFromString(value: string): boolean | undefined {
  const token = value.trim().toLowerCase();
  if (TRUE_TOKENS.has(token)) return true;
  if (FALSE_TOKENS.has(token)) return false;
  return undefined;
}
