import path from 'node:path';
import type { Command } from 'commander';
import {
  USER_TOOLCHAIN_CONF,
  createRecipeLogger,
  loadRecipeConfig,
  packageRecipe,
  parseOptionOverrides
} from '@cmake-util/recipe';
import { collectAssignment, resolvePackageFolder, resolveSourceRoot } from '../lib/options';
import type { CliDependencies } from '../types';

type PackageCommandOptions = {
  output?: string;
  option: string[];
  json?: boolean;
};

export function registerPackageCommand(program: Command, deps: CliDependencies): void {
  program
    .command('package [source]')
    .description('Copy the recipe payload into a package folder and publish its toolchain fragments')
    .option('--output <dir>', 'Package folder (default: CMAKE_UTIL_PACKAGE_DIR)')
    .option('-o, --option <name=value>', 'Override a recipe option (repeatable)', collectAssignment, [])
    .option('--json', 'Print the packaging result as JSON')
    .action(async (source: string | undefined, options: PackageCommandOptions) => {
      const config = loadRecipeConfig(deps.env);
      const cwd = deps.cwd ?? process.cwd();
      const sourceRoot = resolveSourceRoot(source, config, cwd);
      const packageFolder = resolvePackageFolder(options.output, config, cwd);
      const logger = createRecipeLogger({ level: config.logLevel, destination: deps.logDestination });

      const result = await packageRecipe({
        sourceRoot,
        packageFolder,
        overrides: parseOptionOverrides(options.option),
        logger
      });

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              name: result.descriptor.name,
              version: result.descriptor.version,
              packageId: result.packageId,
              options: result.options,
              copied: result.copied.map((file) => path.relative(packageFolder, file.destination)),
              conf: result.conf.toJSON()
            },
            null,
            2
          )
        );
        return;
      }

      console.log(`Packaged ${result.descriptor.name}/${result.descriptor.version}`);
      console.log(`  package id: ${result.packageId}`);
      console.log(`  package folder: ${packageFolder}`);
      console.log(`  copied files: ${result.copied.length}`);
      console.log(`  ${USER_TOOLCHAIN_CONF}:`);
      for (const fragment of result.conf.get(USER_TOOLCHAIN_CONF)) {
        console.log(`    - ${fragment}`);
      }
    });
}
