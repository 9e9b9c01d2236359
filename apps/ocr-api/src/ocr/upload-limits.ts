import type { UploadSettings } from '../config/configuration.interface';

const BYTES_PER_MB = 1024 * 1024;

export function maxUploadBytes(settings: UploadSettings): number {
  return settings.maxFileSizeMb * BYTES_PER_MB;
}

/**
 * Byte limit handed to multer. Busboy truncates a file once it reaches
 * the limit, so a file one byte over the allowed size must stay below it
 * for OcrUploadService to see the whole file and answer with its own 413.
 */
export function multerFileSizeLimit(settings: UploadSettings): number {
  return Math.floor(maxUploadBytes(settings)) + 2;
}

/** Case-insensitive suffix match against the configured extensions */
export function hasAllowedExtension(filename: string, settings: UploadSettings): boolean {
  const name = filename.toLowerCase();
  return settings.allowedExtensions.some((extension) => name.endsWith(extension));
}
