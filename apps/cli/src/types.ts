import type { EnvSource, RecipeLoggerOptions } from '@cmake-util/recipe';

export type CliDependencies = {
  env?: EnvSource;
  cwd?: string;
  logDestination?: RecipeLoggerOptions['destination'];
};
