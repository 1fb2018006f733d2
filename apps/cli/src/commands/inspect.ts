import path from 'node:path';
import type { Command } from 'commander';
import {
  CMAKE_UTIL_DESCRIPTOR,
  loadRecipeConfig,
  parseOptionOverrides,
  resolveManifest
} from '@cmake-util/recipe';
import { collectAssignment, resolveSourceRoot } from '../lib/options';
import type { CliDependencies } from '../types';

type InspectCommandOptions = {
  packageFolder?: string;
  option: string[];
  json?: boolean;
};

export function registerInspectCommand(program: Command, deps: CliDependencies): void {
  program
    .command('inspect [source]')
    .description('Show the resolved options and the fragments a packaging run would publish')
    .option('--package-folder <dir>', 'Root for published fragment paths (default: the source directory)')
    .option('-o, --option <name=value>', 'Override a recipe option (repeatable)', collectAssignment, [])
    .option('--json', 'Print the manifest as JSON')
    .action(async (source: string | undefined, options: InspectCommandOptions) => {
      const config = loadRecipeConfig(deps.env);
      const cwd = deps.cwd ?? process.cwd();
      const sourceRoot = resolveSourceRoot(source, config, cwd);
      const descriptor = CMAKE_UTIL_DESCRIPTOR;
      const resolved = descriptor.resolveOptions(parseOptionOverrides(options.option));
      const packageFolder = options.packageFolder ? path.resolve(cwd, options.packageFolder) : undefined;
      const manifest = await resolveManifest(sourceRoot, resolved, { packageFolder });

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              name: descriptor.name,
              version: descriptor.version,
              license: descriptor.license,
              description: descriptor.description,
              topics: descriptor.topics,
              exportSources: descriptor.exportSources,
              requiredManagerVersion: descriptor.requiredManagerVersion,
              options: resolved,
              copySet: manifest.copySet,
              publishList: manifest.publishList
            },
            null,
            2
          )
        );
        return;
      }

      console.log(`${descriptor.name}/${descriptor.version} (${descriptor.license})`);
      console.log('Options:');
      for (const name of descriptor.optionNames) {
        console.log(`  ${name}: ${resolved[name]}`);
      }
      console.log('Publish order:');
      manifest.publishList.forEach((entry, index) => {
        console.log(`  ${index + 1}. ${entry.path} [${entry.role}]`);
      });
    });
}
