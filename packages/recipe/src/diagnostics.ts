import { clangTidyConfigPath } from './manifest';
import type { RecipeLogger } from './logger';
import type { ResolvedOptions } from './types';

export function reportPackageInfo(
  logger: RecipeLogger,
  packageFolder: string,
  options: ResolvedOptions
): string[] {
  const lines = [
    `clang_tidy_config_path: ${clangTidyConfigPath(packageFolder)}`,
    `add_build_outputs: ${options.add_build_outputs}`,
    `optimize_debug_build: ${options.optimize_debug_build}`
  ];
  for (const line of lines) {
    logger.info(line);
  }
  return lines;
}
