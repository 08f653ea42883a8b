import type { Command } from 'commander';
import { confirmCacheClear } from '../prompts.js';
import { ui } from '../ui.js';
import type { CommandHost } from './host.js';

type CacheClearCommandOptions = {
  yes?: boolean;
};

type CacheRemoveCommandOptions = {
  branch?: string;
};

export function registerCacheCommands(program: Command, host: CommandHost): void {
  program
    .command('cache-list')
    .description('List cached repositories')
    .action(async () => {
      await host.run(async () => {
        const repos = await host.context().cache.listCachedRepos();
        const entries = Object.entries(repos);

        if (entries.length === 0) {
          ui.info('No repositories in cache');
          return true;
        }

        ui.title(`Cached repositories (${entries.length}):`);
        for (const [key, entry] of entries) {
          console.log(`  - ${key}`);
          console.log(`    Path: ${entry.path}`);
          if (entry.branch) console.log(`    Branch: ${entry.branch}`);
          console.log(`    Last updated: ${entry.lastUpdated}`);
        }
        return true;
      });
    });

  program
    .command('cache-clear')
    .description('Remove every cached repository')
    .option('-y, --yes', 'skip the confirmation prompt', false)
    .action(async (options: CacheClearCommandOptions) => {
      await host.run(async () => {
        const { cache } = host.context();
        if (!options.yes && !(await confirmCacheClear(cache.cacheDir))) {
          ui.info('Cache clear cancelled');
          return true;
        }
        await cache.clearCache();
        ui.success('Cache cleared successfully');
        return true;
      });
    });

  program
    .command('cache-remove')
    .description('Remove one repository mirror from the cache')
    .argument('<repo>', 'repository URL or path')
    .option('-b, --branch <branch>', 'remove the mirror of this branch instead of the default one')
    .action(async (repo: string, options: CacheRemoveCommandOptions) => {
      await host.run(async () => {
        await host.context().cache.removeRepo(repo, options.branch);
        ui.success(`Removed ${repo}${options.branch ? ` (branch: ${options.branch})` : ''} from cache`);
        return true;
      });
    });
}
