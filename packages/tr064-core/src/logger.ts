import * as winston from 'winston';
import { Logtail } from '@logtail/node';
import { LogtailTransport } from '@logtail/winston';
import type { ILogtailLog } from '@logtail/types';

/*
```sh
LOG_LEVEL=debug LOG_MODULES=SoapClient,DeviceManager
LOG_HIDE_MODULES=CallMonitor
LOG_TO_FILE=true LOG_FILE_PATH=logs/router.log
```
*/

// רמות לוג מותאמות: trace מחליף את http, verbose ו-silly של winston
const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

/**
 * @hebrew לוגר winston עם מתודות לכל אחת מהרמות המותאמות (כולל trace).
 */
export type ModuleLogger = winston.Logger & {
  [level in keyof typeof logLevels]: winston.LeveledLogMethod;
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'magenta',
};

winston.addColors(logColors);

// שדות שכבר מופיעים בכותרת השורה ולא צריכים להופיע שוב כמטא-דאטה
const RESERVED_INFO_KEYS = new Set(['level', 'message', 'timestamp', 'label', 'module', 'environment', 'stack']);

const splitModuleList = (value: string | undefined): string[] =>
  (value ?? '').split(',').map(m => m.trim()).filter(m => m);

// --- פורמטים ---

const hideByModuleNameFormat = winston.format((info) => {
  const hiddenModules = splitModuleList(process.env.LOG_HIDE_MODULES);
  if (hiddenModules.length > 0 && typeof info.label === 'string' && hiddenModules.includes(info.label)) {
    return false;
  }
  return info;
});

const filterByModuleNameFormat = winston.format((info) => {
  const logModulesEnv = process.env.LOG_MODULES;
  if (!logModulesEnv || logModulesEnv.trim() === '' || logModulesEnv.trim() === '*') {
    return info;
  }
  const allowedModules = splitModuleList(logModulesEnv);
  if (allowedModules.length > 0 && typeof info.label === 'string' && !allowedModules.includes(info.label)) {
    return false;
  }
  return info;
});

/**
 * @hebrew ממיר ערך מטא-דאטה בודד למחרוזת, כולל טיפול בשגיאות ובאובייקטים דמויי-שגיאה של Node.
 */
function formatMetadataValue(key: string, value: unknown): string {
  if (value instanceof Error) {
    return `${key}=Error: ${value.message}${value.stack ? `\nStack: ${value.stack}` : ''}`;
  }
  if (typeof value === 'object' && value !== null && ('code' in value || 'errno' in value || 'syscall' in value)) {
    const parts: string[] = [];
    for (const field of ['message', 'code', 'errno', 'syscall', 'address', 'port'] as const) {
      if (field in value) {
        parts.push(`${field}: ${JSON.stringify(Reflect.get(value, field))}`);
      }
    }
    return `${key}=PotentialError: { ${parts.join(', ')} }`;
  }
  try {
    return `${key}=${JSON.stringify(value)}`;
  } catch {
    return `${key}=[UnstringifiableObject]`;
  }
}

/**
 * @hebrew פונקציית עזר לפורמט של מטא-דאטה של רשומת לוג.
 * @returns מחרוזת המתחילה ברווח, או מחרוזת ריקה אם אין מטא-דאטה.
 */
export function formatLogMetadata(metadata: Record<string, unknown>): string {
  const metaString = Object.entries(metadata)
    .filter(([key]) => !RESERVED_INFO_KEYS.has(key))
    .map(([key, value]) => formatMetadataValue(key, value))
    .join(' ');
  return metaString ? ` ${metaString}` : '';
}

const formatLine = (info: winston.Logform.TransformableInfo, levelString: string): string => {
  const environment = typeof info.environment === 'string' ? info.environment.toUpperCase() : 'UNKNOWN';
  let logMessage = `${String(info.timestamp)} [${environment}] [${levelString}]`;
  if (typeof info.module === 'string') {
    logMessage += ` (${info.module})`;
  }
  logMessage += `: ${String(info.message)}`;
  logMessage += formatLogMetadata({ ...info });
  if (typeof info.stack === 'string') {
    logMessage += `\n${info.stack}`;
  }
  return logMessage;
};

// פורמט טקסט ללא צבעים (לקובץ)
const createTextFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => {
    const originalLevel = info[Symbol.for('level')];
    return formatLine(info, typeof originalLevel === 'string' ? originalLevel.toUpperCase() : 'UNKNOWN_LEVEL');
  })
);

export const consoleFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => formatLine(info, info.level.toUpperCase())),
  winston.format.colorize({ colors: logColors, message: true, level: true, all: true }),
);

export const fileFormat = () => createTextFormat();

// --- טרנספורטים ---

function setupLogtailTransport(moduleName: string, environment: string): winston.transport | null {
  const logtailSourceToken = process.env.LOGTAIL_SOURCE_TOKEN;
  const logtailIngestingHost = process.env.LOGTAIL_INGESTING_HOST;
  const logToLogtail = process.env.LOG_TO_LOGTAIL === 'true';

  if (!logToLogtail) {
    return null;
  }
  if (!logtailSourceToken || !logtailIngestingHost) {
    console.warn(`[LoggerSetup] LOG_TO_LOGTAIL=true but LOGTAIL_SOURCE_TOKEN or LOGTAIL_INGESTING_HOST are missing. Logtail disabled for module: ${moduleName} (${environment}).`);
    return null;
  }

  try {
    const logtail = new Logtail(logtailSourceToken, {
      endpoint: `https://${logtailIngestingHost}`,
    });
    const envLocationForLogtail = process.env.ENV_LOCATION;

    // Logtail לא מכיר את רמת trace: ממפים ל-debug ושומרים את הרמה המקורית
    async function addCustomContextToLogtail(log: ILogtailLog): Promise<ILogtailLog> {
      const logWithContext: ILogtailLog = { ...log };
      if (envLocationForLogtail) {
        logWithContext.env_location = envLocationForLogtail;
      }
      if (logWithContext.level === 'trace') {
        logWithContext.original_level = 'trace';
        logWithContext.level = 'debug';
      }
      return logWithContext;
    }

    logtail.use(addCustomContextToLogtail);
    return new LogtailTransport(logtail);
  } catch (error) {
    console.warn(`[LoggerSetup] Failed to initialize Logtail transport for module: ${moduleName} (${environment}).`, error);
    return null;
  }
}

// --- יצירת לוגרים ---

/**
 * @hebrew יוצר לוגר עבור מודול, לפי משתני הסביבה LOG_*.
 * @param moduleName - שם המודול שיופיע בכל שורה ומשמש לסינון LOG_MODULES / LOG_HIDE_MODULES.
 */
export const createModuleLogger = (moduleName: string): ModuleLogger => {
  const environment = process.env.NODE_ENV || 'unknown';
  const activeTransports: winston.transport[] = [];
  const logToFile = process.env.LOG_TO_FILE === 'true';

  if (process.env.LOG_TO_CONSOLE === 'true' || process.env.LOG_TO_CONSOLE === undefined) {
    activeTransports.push(new winston.transports.Console({ format: consoleFormat() }));
  }

  if (logToFile) {
    activeTransports.push(new winston.transports.File({
      filename: process.env.LOG_FILE_PATH || 'logs/tr064.log',
      format: fileFormat(),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      tailable: true,
    }));
  }

  const logtailTransportInstance = setupLogtailTransport(moduleName, environment);
  if (logtailTransportInstance) {
    activeTransports.push(logtailTransportInstance);
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    levels: logLevels,
    // ללא טרנספורטים winston מתלונן על כל כתיבה
    silent: activeTransports.length === 0,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format((info) => {
        info.environment = environment;
        info.module = moduleName;
        info.label = moduleName;
        return info;
      })(),
      winston.format.errors({ stack: true })
    ),
    transports: activeTransports,
    ...(logToFile && {
      exceptionHandlers: [
        new winston.transports.File({ filename: process.env.LOG_EXCEPTIONS_PATH || 'logs/exceptions.log', format: fileFormat() }),
      ],
      rejectionHandlers: [
        new winston.transports.File({ filename: process.env.LOG_REJECTIONS_PATH || 'logs/rejections.log', format: fileFormat() }),
      ],
    }),
    exitOnError: false,
  }) as ModuleLogger;
};

/**
 * @hebrew לוגר שקט. ברירת המחדל של כל רכיבי הספרייה כאשר לא הועבר לוגר.
 */
export const createNullLogger = (): ModuleLogger =>
  winston.createLogger({ levels: logLevels, silent: true }) as ModuleLogger;

export default createModuleLogger;
export { createTextFormat };
