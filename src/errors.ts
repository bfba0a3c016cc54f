/**
 * Error types shared across the server
 */

/**
 * Raised while building the server's read-only state.
 * The process must not start when one of these escapes bootstrap.
 */
export class StartupError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
    this.source = source;
  }
}

/**
 * Raised when tool arguments do not match the tool's declared schema.
 */
export class ToolArgumentError extends Error {
  readonly tool: string;
  readonly issues: string[];

  constructor(tool: string, issues: string[]) {
    super(`Invalid arguments for ${tool}: ${issues.join('; ')}`);
    this.name = 'ToolArgumentError';
    this.tool = tool;
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
