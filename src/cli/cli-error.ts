import { AutogradError } from '../Errors';

/** Bad command-line input. */
export const EXIT_USAGE = 1;
/** The expression failed to parse or evaluate. */
export const EXIT_EVALUATION = 2;

export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = EXIT_USAGE) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

export function assert(condition: unknown, message: string, exitCode = EXIT_USAGE): asserts condition {
  if (!condition) {
    throw new CliError(message, exitCode);
  }
}

/**
 * Process exit code for an error raised while running a command.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) return error.exitCode;
  if (error instanceof AutogradError) return EXIT_EVALUATION;
  return EXIT_USAGE;
}
