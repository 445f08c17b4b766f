import { loadEnv, type EnvValue } from './envLoader';
import { booleanFromString } from './utils';

/**
 * אובייקט ברירות המחדל של הספרייה.
 * כל עלה ניתן לדריסה באמצעות משתנה סביבה TR064_<PATH>,
 * למשל TR064_CONNECTION_ADDRESS או TR064_MONITOR_QUEUE_SIZE.
 */
export const defaultConfig = {
  connection: {
    address: '169.254.1.1',
    port: 49000,
    tlsPort: 49443,
    useTls: false,
    username: 'dslf-config',
    password: '',
    timeoutMs: 10 * 1000,
  },
  cache: {
    useCache: false,
    verifyCache: true,
    // ריק = ~/.tr064
    directory: '',
  },
  monitor: {
    port: 1012,
    timeoutMs: 10 * 1000,
    queueSize: 256,
    reconnectDelayMs: 60 * 1000,
    reconnectTries: 10,
    blockOnFilledQueue: false,
    encoding: 'utf-8',
  },
};

export type Tr064Config = typeof defaultConfig;

export const ENV_PREFIX = 'TR064';

// פונקציית עזר להמרת camelCase ל-SNAKE_CASE
export const camelToSnakeCase = (str: string): string =>
  str.replace(/[A-Z]/g, letter => `_${letter}`).toUpperCase();

/**
 * @hebrew ממיר ערך ממשתנה סביבה לטיפוס של ערך ברירת המחדל.
 * @returns undefined כאשר לא ניתן להמיר (ואז נשמרת ברירת המחדל).
 */
function coerceLike(defaultValue: string | number | boolean, raw: EnvValue): string | number | boolean | undefined {
  if (raw === undefined) return undefined;
  if (typeof defaultValue === 'number') {
    const num = typeof raw === 'number' ? raw : Number(raw);
    return typeof raw !== 'boolean' && Number.isFinite(num) ? num : undefined;
  }
  if (typeof defaultValue === 'boolean') {
    if (typeof raw === 'boolean') return raw;
    return booleanFromString(String(raw));
  }
  return String(raw);
}

type ConfigNode = { [key: string]: string | number | boolean | ConfigNode };

function initializeNode(defaults: ConfigNode, env: Record<string, EnvValue>, rawEnv: NodeJS.ProcessEnv, path: string[]): ConfigNode {
  const initialized: ConfigNode = {};
  for (const [key, value] of Object.entries(defaults)) {
    const newPath = [...path, key];
    if (typeof value === 'object') {
      initialized[key] = initializeNode(value, env, rawEnv, newPath);
    } else {
      const envVarName = newPath.map(camelToSnakeCase).join('_');
      // ערך מחרוזת (למשל סיסמה "On") נלקח כפי שנכתב, לפני המרה למספר או בוליאני
      const raw = typeof value === 'string' ? rawEnv[envVarName] ?? env[envVarName] : env[envVarName];
      initialized[key] = coerceLike(value, raw) ?? value;
    }
  }
  return initialized;
}

/**
 * פונקציה רקורסיבית שמאתחלת את התצורה.
 * היא עוברת על אובייקט ברירות המחדל, ומחפשת משתני סביבה תואמים
 * כדי לדרוס את הערכים.
 * @param env - משתני הסביבה המעובדים.
 * @param rawEnv - משתני הסביבה כפי שנכתבו, עבור ערכים מסוג מחרוזת.
 */
export function initializeConfig(env: Record<string, EnvValue>, rawEnv: NodeJS.ProcessEnv = {}): Tr064Config {
  const node = initializeNode(defaultConfig, env, rawEnv, [ENV_PREFIX]);
  const { connection, cache, monitor } = defaultConfig;
  const section = (name: string): ConfigNode => {
    const value = node[name];
    return typeof value === 'object' ? value : {};
  };
  const pick = <T extends Record<string, string | number | boolean>>(defaults: T, values: ConfigNode): T => {
    const result = { ...defaults };
    for (const key of Object.keys(defaults)) {
      const value = values[key];
      if (typeof value === typeof defaults[key]) {
        Reflect.set(result, key, value);
      }
    }
    return result;
  };
  return {
    connection: pick(connection, section('connection')),
    cache: pick(cache, section('cache')),
    monitor: pick(monitor, section('monitor')),
  };
}

/**
 * @hebrew טוען את התצורה: קובץ .env (dotenv), משתני סביבה וברירות מחדל.
 * @param envPath - נתיב לקובץ .env נוסף שדורס את הקודם.
 */
export function loadConfig(envPath?: string): Tr064Config {
  return initializeConfig(loadEnv(envPath), process.env);
}
