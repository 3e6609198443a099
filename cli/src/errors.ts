/**
 * Shelfkeep CLI — Usage Errors
 *
 * Thrown by commands for problems with what the user asked for. The
 * entry point prints the message and exits with status 1.
 */

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}
