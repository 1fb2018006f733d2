import path from 'node:path';
import fg from 'fast-glob';
import { MissingSourceError } from './errors';
import { copyFile } from './fs';
import type { CopiedFile, CopyRule, DestinationRule } from './types';

function resolveDestination(rule: DestinationRule, match: string, packageFolder: string): string {
  if (rule.kind === 'directory') {
    return path.join(packageFolder, rule.path, path.basename(match));
  }
  return path.join(packageFolder, match);
}

export async function expandCopySet(
  copySet: readonly CopyRule[],
  sourceRoot: string,
  packageFolder: string
): Promise<CopiedFile[]> {
  const root = path.resolve(sourceRoot);
  const target = path.resolve(packageFolder);
  const planned: CopiedFile[] = [];

  for (const rule of copySet) {
    const matches = await fg(rule.sourcePattern, { cwd: root, onlyFiles: true, dot: false });
    if (rule.required && matches.length === 0) {
      throw new MissingSourceError(path.join(root, rule.sourcePattern));
    }
    for (const match of [...matches].sort()) {
      planned.push({
        source: path.join(root, match),
        destination: resolveDestination(rule.destination, match, target)
      });
    }
  }

  return planned;
}

/**
 * Copies every match of `copySet` into `packageFolder`. All patterns are
 * expanded before the first write, so a missing required file leaves the
 * package folder untouched.
 */
export async function executeCopySet(
  copySet: readonly CopyRule[],
  sourceRoot: string,
  packageFolder: string
): Promise<CopiedFile[]> {
  const planned = await expandCopySet(copySet, sourceRoot, packageFolder);
  for (const file of planned) {
    await copyFile(file.source, file.destination);
  }
  return planned;
}
