export { OcrStatusDto, toOcrStatusDto } from './ocr-status.dto';
export { OcrResultDto, OcrResultMetadataDto } from './ocr-result.dto';
