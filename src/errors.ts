/**
 * Thrown for programming errors (a missing audio handle, a blank title).
 * Source failures never surface as this; the resolver re-throws it instead of
 * treating it as "no data".
 */
export class TrackInfoUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TrackInfoUsageError";
  }
}

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string = "") {
    super(
      `Command failed${exitCode === null ? "" : ` with exit code ${exitCode}`}: ${command}${
        stderr.trim() ? `\n${stderr.trim()}` : ""
      }`
    );
    this.name = "CommandFailedError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
