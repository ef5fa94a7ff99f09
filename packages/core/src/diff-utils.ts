import { createPatch } from 'diff';
import path from 'path';

export interface FileDiffEntry {
  path: string;
  relativePath: string;
  diff: string;
  added: number;
  removed: number;
}

/**
 * Create a unified diff for a rewritten file, or null when nothing changed.
 */
export function createFileDiff(
  filePath: string,
  originalContent: string,
  newContent: string,
  root: string
): FileDiffEntry | null {
  if (originalContent === newContent) {
    return null;
  }

  const relativePath = path.relative(root, filePath) || filePath;
  const diff = createPatch(relativePath, originalContent, newContent);

  let added = 0;
  let removed = 0;
  for (const line of diff.split('\n')) {
    if (line.startsWith('+++') || line.startsWith('---')) {
      continue;
    }
    if (line.startsWith('+')) {
      added++;
    } else if (line.startsWith('-')) {
      removed++;
    }
  }

  return {
    path: filePath,
    relativePath,
    diff,
    added,
    removed,
  };
}
