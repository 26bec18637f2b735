// Contradictory or empty user intent, rejected before anything is spawned
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// A list/describe query exited nonzero
export class ToolQueryError extends Error {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr: string) {
    super(message);
    this.name = 'ToolQueryError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
