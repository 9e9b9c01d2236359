export class OcrResultMetadataDto {
  created_at!: string;

  /** Persisted upload the text was extracted from */
  file_path!: string;

  result_path!: string | null;
}

/**
 * Response body of GET /ocr/result/:jobId.
 */
export class OcrResultDto {
  task_id!: string;

  /** Extracted markdown text */
  text!: string;

  metadata!: OcrResultMetadataDto;
}
