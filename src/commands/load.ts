import type { Command } from 'commander';
import { loadPackage, loadPackagesFromFile } from '../loader.js';
import { ui } from '../ui.js';
import { parseList } from './host.js';
import type { CommandHost } from './host.js';
import type { LoadResult } from '../types.js';

type LoadCommandOptions = {
  version?: string;
  targetDir?: string;
  branch?: string;
  clean?: boolean;
  symlink?: boolean;
};

type LoadFromFileCommandOptions = {
  packages?: string;
  clean?: boolean;
  symlink?: boolean;
};

function printLoadResult(result: LoadResult): void {
  ui.resultStatus(result.success);
  ui.field('Repository', result.repo ?? 'N/A');
  ui.field('Branch', result.branch ?? 'N/A');
  if (result.success) {
    ui.field('Version', result.version ?? 'N/A');
    ui.field('Target', result.targetDir ?? 'N/A');
    if (result.symlink) ui.field('Type', 'Symlink');
  } else {
    ui.field('Error', result.message);
  }
}

export function registerLoadCommands(program: Command, host: CommandHost): void {
  program
    .command('load')
    .description('Load a repository into a local directory')
    .argument('<repo>', 'repository URL or path')
    .option('-v, --version <request>', 'version to load: latest, a constraint such as ">=1.0.0", a tag or a commit')
    .option('-t, --target-dir <dir>', 'directory to load into (default: repo name, plus -<branch> off the default branch)')
    .option('-b, --branch <branch>', 'branch to use when no version is given')
    .option('--clean', 'remove the target directory first', false)
    .option('--symlink', 'link the target into the cache instead of copying', false)
    .action(async (repo: string, options: LoadCommandOptions) => {
      await host.run(async () => {
        const result = await loadPackage({
          repo,
          version: options.version,
          targetDir: options.targetDir,
          branch: options.branch,
          clean: options.clean,
          useSymlink: options.symlink
        }, host.context());
        printLoadResult(result);
        return result.success;
      });
    });

  program
    .command('load-from-file')
    .description('Load the packages listed in a manifest (pkg.json dependencies, miniatures or packages)')
    .argument('<file>', 'manifest file')
    .option('-p, --packages <names>', 'comma-separated package names to load (default: all)')
    .option('--clean', 'remove target directories first', false)
    .option('--symlink', 'link targets into the cache instead of copying', false)
    .action(async (file: string, options: LoadFromFileCommandOptions) => {
      await host.run(async () => {
        const results = await loadPackagesFromFile(file, {
          packageNames: parseList(options.packages),
          clean: options.clean,
          useSymlink: options.symlink
        }, host.context());

        ui.rule();
        ui.title('LOAD RESULTS');
        ui.rule();
        results.forEach((result, i) => {
          ui.info(`\nPackage ${i + 1}/${results.length}${result.package ? ` (${result.package})` : ''}`);
          printLoadResult(result);
        });
        const succeeded = results.filter(r => r.success).length;
        ui.rule('-');
        ui.summary(succeeded, results.length, 'packages loaded');
        ui.rule();

        return succeeded === results.length;
      });
    });
}
