import type { ManifestEntry } from './types';

export const USER_TOOLCHAIN_CONF = 'tools.cmake.cmaketoolchain:user_toolchain';

/** Append-only configuration handed to the consuming build tool. */
export class ConfInfo {
  private readonly values = new Map<string, string[]>();

  append(name: string, value: string): void {
    const current = this.values.get(name);
    if (current) {
      current.push(value);
    } else {
      this.values.set(name, [value]);
    }
  }

  get(name: string): readonly string[] {
    return Object.freeze([...(this.values.get(name) ?? [])]);
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  toJSON(): Record<string, string[]> {
    const snapshot: Record<string, string[]> = {};
    for (const [name, values] of this.values) {
      snapshot[name] = [...values];
    }
    return snapshot;
  }
}

export function publishManifest(publishList: readonly ManifestEntry[], conf: ConfInfo): ConfInfo {
  for (const entry of publishList) {
    conf.append(USER_TOOLCHAIN_CONF, entry.path);
  }
  return conf;
}
