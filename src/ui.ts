import pc from 'picocolors';

/**
 * Centralized UI messaging utilities for consistent CLI experience
 */
export const ui = {
  // Headers and titles
  header: (message: string) => console.log(pc.cyan(message)),
  title: (message: string) => console.log(pc.blue(message)),

  // Status messages
  success: (message: string) => console.log(pc.green(message)),
  error: (message: string) => console.log(pc.red(message)),
  warning: (message: string) => console.log(pc.yellow(message)),
  info: (message: string) => console.log(pc.gray(message)),

  // Special formatting
  highlight: (text: string) => pc.bold(text),
  dim: (text: string) => pc.gray(text),

  // Cache and git progress
  cloning: (url: string) =>
    console.log(pc.gray(`Cloning ${url} to cache...`)),

  branchCreated: (branch: string) =>
    console.log(pc.gray(`Branch '${branch}' not found on remote. Cloning default branch and creating it locally...`)),

  fetchFailed: (url: string, reason: string) =>
    console.log(pc.yellow(`Warning: Failed to fetch updates for ${url}: ${reason}`)),

  symlinkCreated: (target: string, source: string) =>
    console.log(pc.gray(`Created symlink: ${target} -> ${source}`)),

  installHint: (command: string) =>
    console.log(pc.gray(`Note: Run '${command}' to install the package`)),

  // Result blocks
  resultStatus: (success: boolean, failureLabel = 'FAILED') =>
    console.log(success ? `\n${pc.green('✓ SUCCESS')}` : `\n${pc.red(`✗ ${failureLabel}`)}`),

  field: (label: string, value: string) =>
    console.log(`  ${`${label}:`.padEnd(12)}${value}`),

  rule: (char = '=') => console.log(char.repeat(60)),

  summary: (succeeded: number, total: number, noun: string) =>
    console.log(`Summary: ${succeeded}/${total} ${noun} successfully`),

  userCancelled: () => {
    ui.warning('⚠️  Operation cancelled by user');
  }
} as const;
