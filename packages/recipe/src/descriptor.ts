import { createHash } from 'node:crypto';
import { z } from 'zod';
import { flagValue } from './envConfig';
import { InvalidOptionValueError, UnknownOptionError } from './errors';
import {
  OPTION_NAMES,
  type OptionName,
  type OptionOverrides,
  type OptionSchema,
  type PackageIdentity,
  type ResolvedOptions
} from './types';

export type PackageDescriptorInit = PackageIdentity & {
  options: OptionSchema;
  exportSources: readonly string[];
  requiredManagerVersion: string;
};

function buildOptionsValidator(schema: OptionSchema) {
  return z
    .object({
      add_build_outputs: z.boolean().default(schema.add_build_outputs.defaultValue),
      optimize_debug_build: z.boolean().default(schema.optimize_debug_build.defaultValue)
    })
    .strict();
}

/**
 * Static metadata for a distributable bundle plus the boolean options that
 * decide which toolchain fragments it publishes.
 */
export class PackageDescriptor implements PackageIdentity {
  readonly name: string;
  readonly version: string;
  readonly license: string;
  readonly description: string;
  readonly topics: readonly string[];
  readonly options: OptionSchema;
  readonly exportSources: readonly string[];
  readonly requiredManagerVersion: string;
  private readonly validator: ReturnType<typeof buildOptionsValidator>;

  constructor(init: PackageDescriptorInit) {
    this.name = init.name;
    this.version = init.version;
    this.license = init.license;
    this.description = init.description;
    this.topics = Object.freeze([...init.topics]);
    this.options = Object.freeze({ ...init.options });
    this.exportSources = Object.freeze([...init.exportSources]);
    this.requiredManagerVersion = init.requiredManagerVersion;
    this.validator = buildOptionsValidator(this.options);
  }

  get optionNames(): readonly OptionName[] {
    return OPTION_NAMES;
  }

  defaults(): ResolvedOptions {
    return this.resolveOptions({});
  }

  /**
   * Overlays `overrides` onto the schema defaults. Throws
   * `UnknownOptionError` before producing anything when a key is not declared.
   */
  resolveOptions(overrides: OptionOverrides): ResolvedOptions {
    const unknownKeys = Object.keys(overrides).filter((key) => !OPTION_NAMES.some((name) => name === key));
    if (unknownKeys.length > 0) {
      throw new UnknownOptionError(unknownKeys, OPTION_NAMES);
    }
    const result = this.validator.safeParse(overrides);
    if (!result.success) {
      const [first] = result.error.issues;
      const key = first ? first.path.join('.') : '<root>';
      throw new InvalidOptionValueError(key, first?.message ?? 'invalid value');
    }
    return Object.freeze({ ...result.data });
  }

  /**
   * Options only select which fragments are published, so they never take
   * part in the package identity.
   */
  packageId(): string {
    return createHash('sha256').update(`${this.name}/${this.version}`).digest('hex');
  }
}

export function parseOptionOverrides(assignments: readonly string[]): OptionOverrides {
  // fromEntries defines own properties, so a `__proto__` name stays visible to resolveOptions.
  const entries: [string, boolean][] = [];
  for (const assignment of assignments) {
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      throw new InvalidOptionValueError(assignment, 'expected <name>=<value>');
    }
    const key = assignment.slice(0, separator).trim();
    if (!key) {
      throw new InvalidOptionValueError(assignment, 'option name must not be empty');
    }
    const parsed = flagValue(key).safeParse(assignment.slice(separator + 1));
    if (!parsed.success) {
      throw new InvalidOptionValueError(assignment, parsed.error.issues[0]?.message ?? 'invalid value');
    }
    entries.push([key, parsed.data]);
  }
  return Object.fromEntries(entries);
}

export const CMAKE_UTIL_DESCRIPTOR = new PackageDescriptor({
  name: 'cmake-util',
  version: '3.0.1',
  license: 'Apache-2.0',
  description: 'A collection of CMake scripts for ARM Cortex builds',
  topics: ['cmake', 'embedded', 'embedded-systems', 'firmware'],
  exportSources: ['cmake/*', 'LICENSE'],
  requiredManagerVersion: '>=2.0.6',
  options: {
    add_build_outputs: {
      defaultValue: true,
      description: 'Publish the post-build output fragment (hex, bin, disassembly helpers)'
    },
    optimize_debug_build: {
      defaultValue: true,
      description: 'Publish the fragment that builds Debug with -Og -g'
    }
  }
});
