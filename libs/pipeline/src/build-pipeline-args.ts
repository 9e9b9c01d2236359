import type { PipelineRequest } from './interfaces/ocr-pipeline.interface';

/**
 * Builds the argument vector for one pipeline run:
 *
 *   <baseArgs...> <workspaceDir> [--markdown] [--extract_tables] [--extract_figures] --pdfs <sourcePath>
 */
export function buildPipelineArgs(
  baseArgs: readonly string[],
  request: Pick<PipelineRequest, 'workspaceDir' | 'sourcePath' | 'options'>,
): string[] {
  const args = [...baseArgs, request.workspaceDir];

  if (request.options.markdown) args.push('--markdown');
  if (request.options.extractTables) args.push('--extract_tables');
  if (request.options.extractFigures) args.push('--extract_figures');

  args.push('--pdfs', request.sourcePath);
  return args;
}
