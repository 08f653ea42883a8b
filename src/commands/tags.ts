import type { Command } from 'commander';
import { createRepoTag, deleteRepoTag, tagPackage } from '../tagger.js';
import { ui } from '../ui.js';
import type { CommandHost } from './host.js';
import type { TagResult } from '../types.js';

type TagPackageCommandOptions = {
  metaFile: string;
  force?: boolean;
  push: boolean;
};

type TagCommandOptions = {
  message?: string;
  force?: boolean;
  push: boolean;
};

type DeleteTagCommandOptions = {
  remote: boolean;
};

function printTagResult(result: TagResult): void {
  ui.resultStatus(result.success);
  if (result.tagName) ui.field('Tag', result.tagName);
  if (result.success) {
    ui.field('Action', result.action ?? 'N/A');
  } else {
    ui.field('Error', result.message);
  }
}

export function registerTagCommands(program: Command, host: CommandHost): void {
  program
    .command('tag-package')
    .description('Tag the release named by a package\'s metadata file')
    .argument('[dir]', 'package directory', '.')
    .option('-m, --meta-file <file>', 'package metadata file', 'pkg.json')
    .option('-f, --force', 'overwrite an existing tag', false)
    .option('--no-push', 'create the tag locally only')
    .action(async (dir: string, options: TagPackageCommandOptions) => {
      await host.run(async () => {
        const result = await tagPackage({
          pkgDir: dir,
          metaFile: options.metaFile,
          force: options.force,
          push: options.push
        }, host.context());
        printTagResult(result);
        return result.success;
      });
    });

  program
    .command('tag')
    .description('Create a tag at the head of a repository\'s default branch')
    .argument('<repo>', 'repository URL or path')
    .argument('<tag>', 'tag name')
    .option('--message <message>', 'tag message (default: "Release <tag>")')
    .option('-f, --force', 'overwrite an existing tag', false)
    .option('--no-push', 'create the tag locally only')
    .action(async (repo: string, tag: string, options: TagCommandOptions) => {
      await host.run(async () => {
        const result = await createRepoTag({
          repoUrl: repo,
          tagName: tag,
          message: options.message,
          force: options.force,
          push: options.push
        }, host.context());
        printTagResult(result);
        return result.success;
      });
    });

  program
    .command('delete-tag')
    .description('Delete a tag from a cached repository and its origin')
    .argument('<repo>', 'repository URL or path')
    .argument('<tag>', 'tag name')
    .option('--no-remote', 'delete the local tag only')
    .action(async (repo: string, tag: string, options: DeleteTagCommandOptions) => {
      await host.run(async () => {
        const result = await deleteRepoTag({ repoUrl: repo, tagName: tag, remote: options.remote }, host.context());
        ui.resultStatus(result.success);
        if (result.success) {
          ui.field('Local', result.local ?? 'N/A');
          if (result.remote) ui.field('Remote', result.remote);
        } else {
          ui.field('Error', result.message);
        }
        return result.success;
      });
    });
}
