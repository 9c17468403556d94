/**
 * Error taxonomy
 * Every failure that crosses a module boundary is one of these classes
 */

export type ErrorCode =
  | 'INVALID_PATH'
  | 'FILE_READ'
  | 'EXTERNAL_TOOL'
  | 'PROVIDER'
  | 'PARSE';

/**
 * Base class for all deploy-studio errors
 */
export class DeployStudioError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Project root is missing or not a directory
 */
export class InvalidPathError extends DeployStudioError {
  readonly path: string;

  constructor(path: string, reason: 'missing' | 'not-directory' | 'outside-root') {
    const messages = {
      missing: `Path does not exist: ${path}`,
      'not-directory': `Not a directory: ${path}`,
      'outside-root': `Path is outside the project directory: ${path}`,
    };
    super(messages[reason], 'INVALID_PATH');
    this.path = path;
  }
}

/**
 * File could not be read or is not text
 */
export class FileReadError extends DeployStudioError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(message, 'FILE_READ');
    this.path = path;
  }
}

/**
 * The deployment CLI failed to start, or exited non-zero with no success signal
 */
export class ExternalToolError extends DeployStudioError {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, details: { exitCode: number | null; stdout?: string; stderr?: string }) {
    super(message, 'EXTERNAL_TOOL');
    this.exitCode = details.exitCode;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
  }
}

/**
 * Chat provider returned a non-200 response or the request never completed
 */
export class ProviderError extends DeployStudioError {
  readonly provider: string;
  readonly status?: number;
  readonly body: string;

  constructor(provider: string, body: string, status?: number) {
    super(
      status !== undefined ? `API error: ${status} - ${body}` : `API error: ${body}`,
      'PROVIDER'
    );
    this.provider = provider;
    this.status = status;
    this.body = body;
  }
}

/**
 * Structured output from the deployment CLI was not what we expected
 */
export class ParseError extends DeployStudioError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message, 'PARSE');
    this.raw = raw;
  }
}

/**
 * Convert any thrown value to a display message
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
