/**
 * Centralized validation for values that end up on a git command line.
 *
 * Everything is passed to git as a separate argument (never through a shell),
 * but branch and tag names still need checking so that a name cannot be read
 * as an option or as revision syntax.
 */
export class SecurityValidator {
  /**
   * Dangerous patterns that should be rejected in branch and tag names
   */
  private static readonly DANGEROUS_REF_PATTERNS = [
    /\.\./,           // Path traversal and range syntax
    /^-/,             // Option injection (names starting with -)
    /[\x00-\x1f\x7f]/, // Control characters including null bytes
    /[;&|`$(){}]/,    // Shell metacharacters
    /\s/,             // Whitespace characters
    /@\{/,            // Reflog syntax (@{...})
    /[~^:?*[\\]/,     // Revision and glob syntax
    /\/\//,           // Empty path segment
    /\/\./,           // Hidden path segment
    /\.lock$/         // Reserved by git
  ];

  /**
   * Validates a git branch or tag name.
   *
   * Allows the hierarchical names treepack produces itself
   * (`src/math_utils/dev/1.2.0`, `feature/login`, `1.0.0-rc.1+build.5`).
   *
   * @param ref - Branch or tag name to validate
   * @param kind - Used in the error message
   * @returns The trimmed name
   * @throws {Error} When the name contains dangerous patterns or has an invalid format
   */
  static validateRefName(ref: string, kind: 'branch' | 'tag' = 'branch'): string {
    const sanitized = ref.trim();

    if (this.DANGEROUS_REF_PATTERNS.some(pattern => pattern.test(sanitized))) {
      throw new Error(`Invalid ${kind} name: contains dangerous characters`);
    }

    // Must start and end with an alphanumeric character
    if (!/^[a-zA-Z0-9]([a-zA-Z0-9/_.+-]*[a-zA-Z0-9])?$/.test(sanitized)) {
      throw new Error(`Invalid ${kind} name format`);
    }

    if (sanitized.length > 255) {
      throw new Error(`${kind === 'branch' ? 'Branch' : 'Tag'} name too long`);
    }

    return sanitized;
  }

  /**
   * Validates a repository location before it is handed to git.
   *
   * Any scheme git understands is accepted, including plain filesystem paths;
   * only values git would parse as an option or that carry control characters
   * are rejected.
   */
  static validateRemoteUrl(url: string): string {
    const sanitized = url.trim();
    if (!sanitized) {
      throw new Error('Repository URL is required');
    }
    if (sanitized.startsWith('-') || /[\x00-\x1f\x7f]/.test(sanitized)) {
      throw new Error('Invalid repository URL');
    }
    return sanitized;
  }
}

/**
 * Utility functions for consistent error handling across the codebase.
 */
export class ErrorUtils {
  /**
   * Extracts error message from unknown error types consistently.
   */
  static extractErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Wraps a thrown value so it can be stored on a result object.
   */
  static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }
}
