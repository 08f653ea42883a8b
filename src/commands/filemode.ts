import type { Command } from 'commander';
import { ui } from '../ui.js';
import { fixCacheFilemode, fixGitFilemode, isWindowsFilesystem } from '../utils/filemode.js';
import type { FilemodeFixResult } from '../utils/filemode.js';
import type { CommandHost } from './host.js';

function printFixResult(result: FilemodeFixResult, noun: string): void {
  ui.resultStatus(result.success, 'ISSUES FOUND');
  if (result.success) {
    console.log(`  Fixed ${result.fixed.length} ${noun}`);
    return;
  }
  console.log(`  ${result.message}`);
  for (const error of result.errors) {
    console.log(`    - ${error.path}: ${error.error}`);
  }
}

export function registerFilemodeCommands(program: Command, host: CommandHost): void {
  program
    .command('fix-filemode')
    .description('Stop git from tracking executable bits (for repositories on Windows drives under WSL)')
    .argument('[path]', 'repository, or directory of repositories with --recursive', '.')
    .option('-r, --recursive', 'fix every repository found under the path', false)
    .action(async (path: string, options: { recursive?: boolean }) => {
      await host.run(async () => {
        const result = await fixGitFilemode(path, { recursive: options.recursive });
        printFixResult(result, 'repositories');
        return result.success;
      });
    });

  program
    .command('fix-cache-modes')
    .description('Stop git from tracking executable bits in every cached repository')
    .action(async () => {
      await host.run(async () => {
        const { cacheDir } = host.config();
        const result = await fixCacheFilemode(cacheDir);
        printFixResult(result, 'cached repositories');
        if (result.success) console.log(`  Cache: ${cacheDir}`);
        return result.success;
      });
    });

  program
    .command('check-windows-fs')
    .description('Report whether a path is on a Windows drive mounted into WSL')
    .argument('[path]', 'path to check', '.')
    .action(async (path: string) => {
      await host.run(async () => {
        if (isWindowsFilesystem(path)) {
          ui.warning('\n⚠ WARNING');
          console.log(`  Path '${path}' is on Windows filesystem`);
          console.log('  Consider using \'treepack fix-filemode\' to avoid git issues');
        } else {
          ui.success('\n✓ INFO');
          console.log(`  Path '${path}' is on Linux filesystem`);
          console.log('  No filemode issues expected');
        }
        return true;
      });
    });
}
