import { createPatch } from 'diff';
import path from 'path';

export type OutputKind = 'header' | 'table' | 'fallback';

export interface PlannedOutput {
  kind: OutputKind;
  path: string;
  content: string;
  /** Current content on disk, undefined when the file does not exist yet. */
  previous?: string;
}

export interface OutputDiffEntry {
  kind: OutputKind;
  path: string;
  relativePath: string;
  status: 'created' | 'modified';
  diff: string;
}

export function hasChanged(output: PlannedOutput): boolean {
  return output.previous !== output.content;
}

/**
 * Unified patches for every planned output that differs from disk.
 */
export function buildOutputDiffs(outputs: readonly PlannedOutput[], workspaceRoot: string): OutputDiffEntry[] {
  const diffs: OutputDiffEntry[] = [];

  for (const output of outputs) {
    if (!hasChanged(output)) {
      continue;
    }
    const relativePath = path.relative(workspaceRoot, output.path) || output.path;
    diffs.push({
      kind: output.kind,
      path: output.path,
      relativePath,
      status: output.previous === undefined ? 'created' : 'modified',
      diff: createPatch(relativePath, output.previous ?? '', output.content),
    });
  }

  return diffs;
}
