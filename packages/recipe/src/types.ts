export const OPTION_NAMES = ['add_build_outputs', 'optimize_debug_build'] as const;

export type OptionName = (typeof OPTION_NAMES)[number];

export type OptionSchema = Readonly<Record<OptionName, { defaultValue: boolean; description: string }>>;

export type OptionOverrides = Record<string, boolean>;

export type ResolvedOptions = Readonly<Record<OptionName, boolean>>;

export type ManifestRole =
  | 'build-outputs-fragment'
  | 'debug-optimization-fragment'
  | 'color-output-fragment'
  | 'core-build-fragment';

export type ManifestEntry = Readonly<{
  path: string;
  role: ManifestRole;
}>;

export type DestinationRule =
  | Readonly<{ kind: 'directory'; path: string }>
  | Readonly<{ kind: 'mirror' }>;

export type CopyRule = Readonly<{
  sourcePattern: string;
  destination: DestinationRule;
  required: boolean;
}>;

export type InstallManifest = Readonly<{
  copySet: readonly CopyRule[];
  publishList: readonly ManifestEntry[];
}>;

export type CopiedFile = {
  source: string;
  destination: string;
};

export type PackageIdentity = Readonly<{
  name: string;
  version: string;
  license: string;
  description: string;
  topics: readonly string[];
}>;
