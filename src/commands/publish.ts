import type { Command } from 'commander';
import { publishFromConfig, publishPackage } from '../publisher.js';
import { pushPackage } from '../push.js';
import { ui } from '../ui.js';
import { parseList } from './host.js';
import type { CommandHost } from './host.js';
import type { PublishResult } from '../types.js';

type PublishCommandOptions = {
  metaFile: string;
  message?: string;
  push: boolean;
  tag: boolean;
  forceTag?: boolean;
};

type PublishFromFileCommandOptions = Omit<PublishCommandOptions, 'metaFile'> & {
  packages?: string;
};

type PushCommandOptions = {
  metaFile: string;
  message?: string;
  push: boolean;
};

function printPublishResult(label: string, result: PublishResult): void {
  ui.resultStatus(result.success);
  ui.field('Package', label);
  if (result.success) {
    ui.field('Repository', result.repoPath ?? 'N/A');
    ui.field('Message', result.commitMessage ?? 'N/A');
    if (result.tagResult?.tagName) ui.field('Tag', result.tagResult.tagName);
    ui.field('Pushed', result.pushed ? 'Yes' : 'No');
  } else {
    ui.field('Error', result.message);
  }
}

export function registerPublishCommands(program: Command, host: CommandHost): void {
  program
    .command('publish')
    .description('Publish a package directory to its repository and tag the release')
    .argument('[dir]', 'package directory', '.')
    .option('-m, --meta-file <file>', 'package metadata file', 'pkg.json')
    .option('--message <message>', 'commit message')
    .option('--no-push', 'commit locally without pushing')
    .option('--no-tag', 'do not create a version tag')
    .option('--force-tag', 'overwrite an existing version tag', false)
    .action(async (dir: string, options: PublishCommandOptions) => {
      await host.run(async () => {
        const result = await publishPackage({
          pkgDir: dir,
          metaFile: options.metaFile,
          commitMessage: options.message,
          push: options.push,
          tag: options.tag,
          forceTag: options.forceTag
        }, host.context());
        printPublishResult(dir, result);
        return result.success;
      });
    });

  program
    .command('publish-from-file')
    .description('Publish every loaded package of a workspace manifest')
    .argument('<file>', 'manifest file with a miniatures or repos list')
    .option('-p, --packages <names>', 'comma-separated package names to publish (default: all)')
    .option('--message <message>', 'commit message')
    .option('--no-push', 'commit locally without pushing')
    .option('--no-tag', 'do not create version tags')
    .option('--force-tag', 'overwrite existing version tags', false)
    .action(async (file: string, options: PublishFromFileCommandOptions) => {
      await host.run(async () => {
        const results = await publishFromConfig(file, {
          packageNames: parseList(options.packages),
          commitMessage: options.message,
          push: options.push,
          tag: options.tag,
          forceTag: options.forceTag
        }, host.context());

        for (const result of results) {
          printPublishResult(result.package ?? 'N/A', result);
        }
        const succeeded = results.filter(r => r.success).length;
        console.log();
        ui.summary(succeeded, results.length, 'packages published');
        return succeeded === results.length;
      });
    });

  program
    .command('push')
    .description('Copy a package directory into its repository and commit, without tagging')
    .argument('[dir]', 'package directory', '.')
    .option('-m, --meta-file <file>', 'package metadata file', 'pkg.json')
    .option('--message <message>', 'commit message')
    .option('--no-push', 'commit locally without pushing')
    .action(async (dir: string, options: PushCommandOptions) => {
      await host.run(async () => {
        const result = await pushPackage({
          pkgDir: dir,
          metaFile: options.metaFile,
          commitMessage: options.message,
          push: options.push
        }, host.context());
        ui.resultStatus(result.success);
        ui.field('Package', dir);
        if (result.success) {
          ui.field('Repository', result.repoPath ?? 'N/A');
          ui.field('Message', result.commitMessage ?? 'N/A');
          ui.field('Pushed', result.pushed ? 'Yes' : 'No');
          ui.info(result.message);
        } else {
          ui.field('Error', result.message);
        }
        return result.success;
      });
    });
}
