// Error message sanitization for alerts and audit entries

export interface SanitizedError {
  code: string;
  message: string;
}

/**
 * Strips details that do not belong in human-facing artifacts.
 *
 * - Absolute paths are collapsed to their file name
 * - Stack frames are removed
 * - Credential-looking values are masked
 *
 * @example
 * ErrorSanitizer.sanitize(new Error("open /srv/vault/plans/a.json failed"));
 * // { code: 'ERROR', message: 'open a.json failed' }
 */
export class ErrorSanitizer {
  private static readonly UNIX_PATH = /(?:\/[\w.-]+)+\/([\w.-]+)/g;
  private static readonly WINDOWS_PATH = /[a-zA-Z]:\\(?:[\w.-]+\\)+([\w.-]+)/g;
  private static readonly STACK_FRAME = /\s+at .*\(.*:\d+:\d+\)/g;
  private static readonly CREDENTIAL = /\b(token|key|secret|password)=\S+/gi;

  static sanitize(error: unknown): SanitizedError {
    const code =
      typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
        ? error.code
        : "ERROR";
    const raw = error instanceof Error ? error.message : String(error);

    const message = raw
      .replace(this.STACK_FRAME, "")
      .replace(this.UNIX_PATH, "$1")
      .replace(this.WINDOWS_PATH, "$1")
      .replace(this.CREDENTIAL, "$1=[REDACTED]")
      .trim();

    return { code, message };
  }

  static message(error: unknown): string {
    return this.sanitize(error).message;
  }
}
