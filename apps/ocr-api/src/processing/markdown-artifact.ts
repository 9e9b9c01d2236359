import { readdir } from 'fs/promises';
import { join, posix } from 'path';
import { hasErrorCode } from '../common/errors/error-details';

/** Directory inside a job workspace where the pipeline writes markdown */
export const MARKDOWN_DIR = 'markdown';

/**
 * Finds the markdown file produced for a job: every `*.md` below
 * `{workspace}/markdown`, ordered by relative path, first one wins.
 *
 * @returns absolute path of the artifact, or null when there is none
 */
export async function locateMarkdownArtifact(workspacePath: string): Promise<string | null> {
  const root = join(workspacePath, MARKDOWN_DIR);
  const matches = await collectMarkdown(root, '');

  if (matches.length === 0) {
    return null;
  }

  matches.sort();
  return join(root, ...matches[0].split(posix.sep));
}

async function collectMarkdown(root: string, relative: string): Promise<string[]> {
  let entries;
  try {
    entries = await readdir(join(root, relative), { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }

  const found: string[] = [];
  for (const entry of entries) {
    const entryPath = relative ? posix.join(relative, entry.name) : entry.name;

    if (entry.isDirectory()) {
      found.push(...(await collectMarkdown(root, entryPath)));
    } else if (entry.isFile() && entry.name.endsWith('.md')) {
      found.push(entryPath);
    }
  }
  return found;
}
