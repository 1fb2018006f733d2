import { z } from 'zod';
import { directoryVar, loadEnvConfig, type EnvSource } from './envConfig';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type RecipeConfig = {
  logLevel: LogLevel;
  sourceDir?: string;
  packageDir?: string;
};

const recipeEnvSchema = z
  .object({
    CMAKE_UTIL_LOG_LEVEL: z
      .string()
      .optional()
      .transform((value) => value?.trim().toLowerCase() || 'info')
      .pipe(z.enum(LOG_LEVELS)),
    CMAKE_UTIL_SOURCE_DIR: directoryVar,
    CMAKE_UTIL_PACKAGE_DIR: directoryVar
  })
  .transform(
    (env): RecipeConfig => ({
      logLevel: env.CMAKE_UTIL_LOG_LEVEL,
      sourceDir: env.CMAKE_UTIL_SOURCE_DIR,
      packageDir: env.CMAKE_UTIL_PACKAGE_DIR
    })
  );

export function loadRecipeConfig(env?: EnvSource): RecipeConfig {
  return loadEnvConfig(recipeEnvSchema, env);
}
