import { Command } from 'commander';
import { CMAKE_UTIL_DESCRIPTOR } from '@cmake-util/recipe';
import { registerInspectCommand } from './commands/inspect';
import { registerPackageCommand } from './commands/package';
import type { CliDependencies } from './types';

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('cmake-util-recipe')
    .description('Package CMake build scripts and publish their toolchain fragments')
    .version(CMAKE_UTIL_DESCRIPTOR.version);

  registerPackageCommand(program, deps);
  registerInspectCommand(program, deps);

  return program;
}
