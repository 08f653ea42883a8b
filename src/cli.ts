import { Command, CommanderError } from 'commander';
import { resolveConfig } from './config.js';
import type { TreepackConfig } from './config.js';
import { createContext } from './context.js';
import { handlePromptError } from './prompts.js';
import { registerCacheCommands } from './commands/cache.js';
import { registerFilemodeCommands } from './commands/filemode.js';
import { registerLoadCommands } from './commands/load.js';
import { registerPublishCommands } from './commands/publish.js';
import { registerTagCommands } from './commands/tags.js';
import type { CommandHost } from './commands/host.js';
import type { TreepackContext } from './types.js';

export const VERSION = '0.1.0';

type GlobalOptions = {
  cacheDir?: string;
  defaultBranch?: string;
};

/**
 * Builds the `treepack` program. Global options go before the command name.
 *
 * @returns The program and a reader for the exit status its commands settled on
 */
export function createProgram(env: NodeJS.ProcessEnv = process.env): { program: Command; exitCode: () => number } {
  const program = new Command();
  let exitCode = 0;
  let context: TreepackContext | undefined;

  program
    .name('treepack')
    .description('Load, publish and tag versioned packages kept in git repositories')
    .version(VERSION, '-V, --version')
    .option('--cache-dir <dir>', 'cache root (default: $TREEPACK_CACHE_DIR or ~/.treepack/cache)')
    .option('--default-branch <branch>', 'branch whose tags carry no branch segment (default: main)')
    .enablePositionalOptions()
    .exitOverride();

  const config = (): TreepackConfig => resolveConfig(program.opts<GlobalOptions>(), env);

  const host: CommandHost = {
    run: async task => {
      if (!(await task())) exitCode = 1;
    },
    config,
    context: () => {
      context ??= createContext(program.opts<GlobalOptions>(), env);
      return context;
    }
  };

  registerLoadCommands(program, host);
  registerPublishCommands(program, host);
  registerTagCommands(program, host);
  registerCacheCommands(program, host);
  registerFilemodeCommands(program, host);

  return { program, exitCode: () => exitCode };
}

/**
 * Runs the command line and resolves to the process exit status.
 */
export async function main(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const { program, exitCode } = createProgram(env);
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    return handlePromptError(error);
  }
  return exitCode();
}
