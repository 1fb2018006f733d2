import path from 'node:path';
import type { RecipeConfig } from '@cmake-util/recipe';

export function collectAssignment(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function resolveSourceRoot(
  directory: string | undefined,
  config: RecipeConfig,
  cwd: string
): string {
  return path.resolve(cwd, directory ?? config.sourceDir ?? '.');
}

export function resolvePackageFolder(
  explicit: string | undefined,
  config: RecipeConfig,
  cwd: string
): string {
  const candidate = explicit ?? config.packageDir;
  if (!candidate) {
    throw new Error('Package folder is required. Pass --output <dir> or set CMAKE_UTIL_PACKAGE_DIR.');
  }
  return path.resolve(cwd, candidate);
}
