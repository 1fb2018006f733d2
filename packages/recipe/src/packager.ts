import path from 'node:path';
import { ConfInfo, publishManifest } from './conf';
import { CMAKE_UTIL_DESCRIPTOR, type PackageDescriptor } from './descriptor';
import { reportPackageInfo } from './diagnostics';
import { executeCopySet } from './install';
import { createRecipeLogger, type RecipeLogger } from './logger';
import { resolveManifest } from './manifest';
import type { CopiedFile, InstallManifest, OptionOverrides, ResolvedOptions } from './types';

export type PackageRecipeOptions = {
  sourceRoot: string;
  packageFolder: string;
  overrides?: OptionOverrides;
  descriptor?: PackageDescriptor;
  logger?: RecipeLogger;
  conf?: ConfInfo;
};

export type PackageRecipeResult = {
  descriptor: PackageDescriptor;
  packageId: string;
  options: ResolvedOptions;
  manifest: InstallManifest;
  copied: CopiedFile[];
  conf: ConfInfo;
  diagnostics: string[];
};

export async function packageRecipe(options: PackageRecipeOptions): Promise<PackageRecipeResult> {
  const descriptor = options.descriptor ?? CMAKE_UTIL_DESCRIPTOR;
  const logger = options.logger ?? createRecipeLogger();
  const sourceRoot = path.resolve(options.sourceRoot);
  const packageFolder = path.resolve(options.packageFolder);

  const resolved = descriptor.resolveOptions(options.overrides ?? {});
  const manifest = await resolveManifest(sourceRoot, resolved, { packageFolder });

  const copied = await executeCopySet(manifest.copySet, sourceRoot, packageFolder);
  logger.debug({ count: copied.length, packageFolder }, 'copied package files');

  const conf = publishManifest(manifest.publishList, options.conf ?? new ConfInfo());
  const diagnostics = reportPackageInfo(logger, packageFolder, resolved);

  return {
    descriptor,
    packageId: descriptor.packageId(),
    options: resolved,
    manifest,
    copied,
    conf,
    diagnostics
  };
}
