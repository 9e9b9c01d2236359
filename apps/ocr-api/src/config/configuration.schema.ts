import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import type { PipelineOptions, PipelineSettings } from '@ocr-gateway/pipeline';
import type {
  AppConfiguration,
  AppSettings,
  CorsSettings,
  JwtAlgorithm,
  LogLevelName,
  LoggingSettings,
  SecuritySettings,
  UploadSettings,
  UserCredential,
} from './configuration.interface';

/**
 * class-validator mirror of AppConfiguration.
 *
 * `loadConfiguration()` runs the merged defaults/file/env object through
 * plainToInstance + validateSync against these classes before anything
 * else sees it.
 */

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['error', 'warn', 'info', 'debug', 'verbose'];
export const JWT_ALGORITHMS: readonly JwtAlgorithm[] = ['HS256', 'HS384', 'HS512'];

class AppSettingsSchema implements AppSettings {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsString()
  description!: string;

  @IsString()
  @IsNotEmpty()
  version!: string;

  @IsString()
  @IsNotEmpty()
  host!: string;

  @IsInt({ message: 'app.port must be an integer' })
  @Min(1)
  @Max(65535)
  port!: number;

  @IsBoolean()
  debug!: boolean;
}

class SecuritySettingsSchema implements SecuritySettings {
  @IsString()
  @IsNotEmpty({ message: 'security.secretKey must not be empty' })
  secretKey!: string;

  @IsIn(JWT_ALGORITHMS)
  algorithm!: JwtAlgorithm;

  @IsInt()
  @Min(1)
  accessTokenExpireMinutes!: number;
}

class UserCredentialSchema implements UserCredential {
  @IsString()
  @IsNotEmpty()
  username!: string;

  @IsString()
  @IsNotEmpty()
  password!: string;
}

class PipelineOptionsSchema implements PipelineOptions {
  @IsBoolean()
  markdown!: boolean;

  @IsBoolean()
  extractTables!: boolean;

  @IsBoolean()
  extractFigures!: boolean;
}

class PipelineSettingsSchema implements PipelineSettings {
  @IsString()
  @IsNotEmpty()
  command!: string;

  @IsArray()
  @IsString({ each: true })
  args!: string[];

  @ValidateNested()
  @Type(() => PipelineOptionsSchema)
  options!: PipelineOptionsSchema;

  @IsNumber()
  @Min(0)
  timeoutSeconds!: number;

  @IsInt()
  @Min(1)
  maxConcurrentJobs!: number;

  @IsInt()
  @Min(1)
  queueCapacity!: number;
}

class UploadSettingsSchema implements UploadSettings {
  @IsArray()
  @ArrayNotEmpty()
  @Matches(/^\.[a-z0-9]+$/, {
    each: true,
    message: 'upload.allowedExtensions entries must look like ".pdf"',
  })
  allowedExtensions!: string[];

  @IsNumber()
  @Min(0)
  maxFileSizeMb!: number;
}

class CorsSettingsSchema implements CorsSettings {
  @IsArray()
  @IsString({ each: true })
  origins!: string[];
}

class LoggingSettingsSchema implements LoggingSettings {
  @IsIn(LOG_LEVEL_NAMES)
  level!: LogLevelName;
}

export class ConfigurationSchema implements AppConfiguration {
  @ValidateNested()
  @Type(() => AppSettingsSchema)
  app!: AppSettingsSchema;

  @ValidateNested()
  @Type(() => SecuritySettingsSchema)
  security!: SecuritySettingsSchema;

  @IsArray()
  @ArrayNotEmpty({ message: 'at least one user must be configured' })
  @ValidateNested({ each: true })
  @Type(() => UserCredentialSchema)
  users!: UserCredentialSchema[];

  @IsString()
  @IsNotEmpty()
  workDir!: string;

  @ValidateNested()
  @Type(() => PipelineSettingsSchema)
  pipeline!: PipelineSettingsSchema;

  @ValidateNested()
  @Type(() => UploadSettingsSchema)
  upload!: UploadSettingsSchema;

  @ValidateNested()
  @Type(() => CorsSettingsSchema)
  cors!: CorsSettingsSchema;

  @ValidateNested()
  @Type(() => LoggingSettingsSchema)
  logging!: LoggingSettingsSchema;
}
