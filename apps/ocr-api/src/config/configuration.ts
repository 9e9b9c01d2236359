import { readFileSync } from 'fs';
import { resolve } from 'path';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import type { AppConfiguration } from './configuration.interface';
import { ConfigurationError } from './configuration.error';
import { ConfigurationSchema } from './configuration.schema';
import { errorMessage, hasErrorCode } from '../common/errors/error-details';

/** Placeholder secret shipped in the defaults; startup warns while it is in use */
export const DEFAULT_SECRET_KEY = 'change-me-before-deploying';

const DEFAULT_CONFIG_PATH = 'config.json';

type PlainObject = Record<string, unknown>;

/**
 * Built-in defaults, the bottom layer of the configuration stack.
 */
export function createDefaultConfiguration(): AppConfiguration {
  return {
    app: {
      title: 'OCR Job Gateway',
      description: 'Upload PDF and image documents for OCR and poll for the markdown result',
      version: '1.0.0',
      host: '0.0.0.0',
      port: 8000,
      debug: false,
    },
    security: {
      secretKey: DEFAULT_SECRET_KEY,
      algorithm: 'HS256',
      accessTokenExpireMinutes: 30,
    },
    users: [{ username: 'admin', password: 'secret' }],
    workDir: './ocr_workdir',
    pipeline: {
      command: 'python',
      args: ['-m', 'olmocr.pipeline'],
      options: { markdown: true, extractTables: true, extractFigures: true },
      timeoutSeconds: 0,
      maxConcurrentJobs: 2,
      queueCapacity: 100,
    },
    upload: {
      allowedExtensions: ['.pdf', '.png', '.jpg', '.jpeg'],
      maxFileSizeMb: 50,
    },
    cors: {
      origins: ['*'],
    },
    logging: {
      level: 'info',
    },
  };
}

/**
 * Resolves the application configuration in three layers:
 *
 *   1. built-in defaults
 *   2. JSON file at CONFIG_PATH (default ./config.json, optional)
 *   3. environment variable overrides
 *
 * The merged result is validated and deep-frozen. Called once, as the
 * ConfigModule `load` factory; nothing else reads process.env.
 *
 * @throws ConfigurationError on unreadable/malformed files or invalid values
 */
export function loadConfiguration(
  env: NodeJS.ProcessEnv = process.env,
): AppConfiguration {
  const merged = deepMerge(
    toPlainObject(createDefaultConfiguration()),
    readConfigFile(env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH),
  );

  applyEnvironmentOverrides(merged, env);
  normaliseExtensions(merged);

  const config = plainToInstance(ConfigurationSchema, merged);
  const errors = validateSync(config, { forbidUnknownValues: true });

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Configuration validation failed:\n${formatErrors(errors).join('\n')}`,
    );
  }

  return deepFreeze(config);
}

// ── Layers ──────────────────────────────────────────────────

function readConfigFile(configPath: string): PlainObject {
  const filePath = resolve(configPath);
  let content: string;

  try {
    content = readFileSync(filePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return {};
    }
    throw new ConfigurationError(`Cannot read config file ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = errorMessage(error);
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON: ${reason}`, {
      cause: error,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function applyEnvironmentOverrides(config: PlainObject, env: NodeJS.ProcessEnv): void {
  const set = (section: string, key: string, value: unknown): void => {
    const target = config[section];
    if (isPlainObject(target)) {
      target[key] = value;
    } else {
      config[section] = { [key]: value };
    }
  };

  if (env.APP_HOST) set('app', 'host', env.APP_HOST);
  if (env.APP_PORT) set('app', 'port', Number(env.APP_PORT));
  if (env.DEBUG) set('app', 'debug', env.DEBUG.toLowerCase() === 'true');

  if (env.SECRET_KEY) set('security', 'secretKey', env.SECRET_KEY);
  if (env.ACCESS_TOKEN_EXPIRE_MINUTES) {
    set('security', 'accessTokenExpireMinutes', Number(env.ACCESS_TOKEN_EXPIRE_MINUTES));
  }

  if (env.ADMIN_USERNAME && env.ADMIN_PASSWORD) {
    overrideAdminUser(config, env.ADMIN_USERNAME, env.ADMIN_PASSWORD);
  }

  if (env.WORK_DIR) config.workDir = env.WORK_DIR;

  if (env.MAX_FILE_SIZE_MB) set('upload', 'maxFileSizeMb', Number(env.MAX_FILE_SIZE_MB));

  if (env.PIPELINE_COMMAND) set('pipeline', 'command', env.PIPELINE_COMMAND);
  if (env.PIPELINE_TIMEOUT_SECONDS) {
    set('pipeline', 'timeoutSeconds', Number(env.PIPELINE_TIMEOUT_SECONDS));
  }

  if (env.CORS_ORIGINS) {
    set(
      'cors',
      'origins',
      env.CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    );
  }

  if (env.LOG_LEVEL) set('logging', 'level', env.LOG_LEVEL.toLowerCase());
}

/** ADMIN_USERNAME/ADMIN_PASSWORD replace the "admin" entry, or add one */
function overrideAdminUser(config: PlainObject, username: string, password: string): void {
  const users = Array.isArray(config.users) ? config.users : [];
  const admin = users.find(
    (user): user is PlainObject => isPlainObject(user) && user.username === 'admin',
  );

  if (admin) {
    admin.username = username;
    admin.password = password;
  } else {
    users.push({ username, password });
  }
  config.users = users;
}

function normaliseExtensions(config: PlainObject): void {
  const upload = config.upload;
  if (isPlainObject(upload) && Array.isArray(upload.allowedExtensions)) {
    upload.allowedExtensions = upload.allowedExtensions.map((ext) =>
      typeof ext === 'string' ? ext.trim().toLowerCase() : ext,
    );
  }
}

// ── Helpers ─────────────────────────────────────────────────

function toPlainObject(config: AppConfiguration): PlainObject {
  const plain: unknown = JSON.parse(JSON.stringify(config));
  return isPlainObject(plain) ? plain : {};
}

/** Objects merge key by key; arrays and scalars from `override` replace */
function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] =
      isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }

  return result;
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function formatErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `  - ${path}: ${message}`);
    return [...own, ...formatErrors(error.children ?? [], path)];
  });
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
