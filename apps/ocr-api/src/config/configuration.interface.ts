import type { PipelineSettings } from '@ocr-gateway/pipeline';

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'verbose';

export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface AppSettings {
  title: string;
  description: string;
  version: string;
  host: string;
  port: number;
  debug: boolean;
}

export interface SecuritySettings {
  secretKey: string;
  algorithm: JwtAlgorithm;
  accessTokenExpireMinutes: number;
}

/** `password` is a bcrypt hash or, for legacy setups, the plaintext password */
export interface UserCredential {
  username: string;
  password: string;
}

export interface UploadSettings {
  /** Lower-case suffixes including the dot, e.g. ".pdf" */
  allowedExtensions: string[];
  maxFileSizeMb: number;
}

export interface CorsSettings {
  origins: string[];
}

export interface LoggingSettings {
  level: LogLevelName;
}

/**
 * Fully resolved configuration. Produced once at startup by
 * `loadConfiguration()` and frozen; read through ConfigService.
 */
export interface AppConfiguration {
  app: AppSettings;
  security: SecuritySettings;
  users: UserCredential[];
  workDir: string;
  pipeline: PipelineSettings;
  upload: UploadSettings;
  cors: CorsSettings;
  logging: LoggingSettings;
}
