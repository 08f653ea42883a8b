import { confirm } from '@inquirer/prompts';
import { UserCancelledError } from './errors.js';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/security.js';

/**
 * Asks before wiping every mirror under a cache root.
 *
 * @returns Whether the user agreed
 * @throws {UserCancelledError} When the prompt is aborted (Ctrl+C or ESC)
 */
export async function confirmCacheClear(cacheDir: string): Promise<boolean> {
  try {
    return await confirm({
      message: `Remove every repository cached under ${cacheDir}?`,
      default: false
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'ExitPromptError' || error.message.includes('User force closed'))) {
      throw new UserCancelledError('Operation cancelled by user (Ctrl+C)');
    }
    throw error;
  }
}

/**
 * Reports an error that escaped a command and returns the exit status for it:
 * 0 for a cancelled prompt, 1 otherwise.
 *
 * @example
 * ```typescript
 * try {
 *   await program.parseAsync(argv);
 * } catch (error) {
 *   process.exitCode = handlePromptError(error);
 * }
 * ```
 */
export function handlePromptError(error: unknown): number {
  if (error instanceof UserCancelledError) {
    ui.userCancelled();
    return 0;
  }

  ui.error(`❌ An error occurred: ${ErrorUtils.extractErrorMessage(error)}`);
  return 1;
}
