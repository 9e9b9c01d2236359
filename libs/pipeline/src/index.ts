/**
 * @ocr-gateway/pipeline
 *
 * The external OCR program as a capability:
 *   - OcrPipeline / OCR_PIPELINE   contract and injection token
 *   - SubprocessOcrPipeline       child-process implementation
 *   - PipelineModule.forRoot()    wires the implementation from config
 */
export { OCR_PIPELINE } from './interfaces/ocr-pipeline.interface';
export type {
  OcrPipeline,
  PipelineOptions,
  PipelineOutcome,
  PipelineRequest,
  PipelineSettings,
} from './interfaces/ocr-pipeline.interface';
export { buildPipelineArgs } from './build-pipeline-args';
export { SubprocessOcrPipeline } from './subprocess-ocr-pipeline';
export { PipelineModule } from './pipeline.module';
