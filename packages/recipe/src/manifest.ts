import path from 'node:path';
import { MissingSourceError } from './errors';
import { isFile } from './fs';
import type { CopyRule, InstallManifest, ManifestEntry, ManifestRole, ResolvedOptions } from './types';

export const LICENSE_FILE = 'LICENSE';
export const SCRIPT_DIR = 'cmake';
export const CLANG_TIDY_CONFIG = `${SCRIPT_DIR}/clang-tidy.conf`;

export const COPY_SET: readonly CopyRule[] = Object.freeze([
  Object.freeze({
    sourcePattern: LICENSE_FILE,
    destination: Object.freeze({ kind: 'directory', path: 'licenses' } as const),
    required: true
  }),
  Object.freeze({
    sourcePattern: `${SCRIPT_DIR}/**/*.cmake`,
    destination: Object.freeze({ kind: 'mirror' } as const),
    required: false
  }),
  Object.freeze({
    sourcePattern: `${SCRIPT_DIR}/**/*.conf`,
    destination: Object.freeze({ kind: 'mirror' } as const),
    required: false
  })
]);

export const FRAGMENTS = {
  buildOutputs: `${SCRIPT_DIR}/build_outputs.cmake`,
  optimizeDebugBuild: `${SCRIPT_DIR}/optimize_debug_build.cmake`,
  colors: `${SCRIPT_DIR}/colors.cmake`,
  build: `${SCRIPT_DIR}/build.cmake`
} as const;

export type ResolveManifestOptions = {
  packageFolder?: string;
};

function entry(packageFolder: string, relativePath: string, role: ManifestRole): ManifestEntry {
  return Object.freeze({ path: path.resolve(packageFolder, relativePath), role });
}

/**
 * Decides which toolchain fragments to publish. Consumers layer fragments in
 * the returned order, so later entries override earlier ones.
 */
export function planPublishList(packageFolder: string, options: ResolvedOptions): readonly ManifestEntry[] {
  const publishList: ManifestEntry[] = [];
  if (options.add_build_outputs) {
    publishList.push(entry(packageFolder, FRAGMENTS.buildOutputs, 'build-outputs-fragment'));
  }
  if (options.optimize_debug_build) {
    publishList.push(entry(packageFolder, FRAGMENTS.optimizeDebugBuild, 'debug-optimization-fragment'));
  }
  publishList.push(entry(packageFolder, FRAGMENTS.colors, 'color-output-fragment'));
  publishList.push(entry(packageFolder, FRAGMENTS.build, 'core-build-fragment'));
  return Object.freeze(publishList);
}

export async function resolveManifest(
  sourceRoot: string,
  options: ResolvedOptions,
  settings: ResolveManifestOptions = {}
): Promise<InstallManifest> {
  const root = path.resolve(sourceRoot);
  for (const rule of COPY_SET) {
    if (!rule.required) {
      continue;
    }
    const requiredPath = path.join(root, rule.sourcePattern);
    if (!(await isFile(requiredPath))) {
      throw new MissingSourceError(requiredPath);
    }
  }

  const packageFolder = path.resolve(settings.packageFolder ?? root);
  return Object.freeze({
    copySet: COPY_SET,
    publishList: planPublishList(packageFolder, options)
  });
}

export function clangTidyConfigPath(packageFolder: string): string {
  return path.resolve(packageFolder, CLANG_TIDY_CONFIG);
}
