// ============================================================================
// RF Mapper: Error Types
// ============================================================================

/** Base class for errors that end the process with a specific exit code */
export class MapperError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or contradictory settings. Fatal at startup. */
export class ConfigurationError extends MapperError {
  override readonly exitCode = 2;
}

/** The sample source could not be opened or read */
export class HardwareError extends MapperError {
  override readonly exitCode = 3;
}

/** Output destination exists and the operator did not agree to overwrite it */
export class OutputConflictError extends MapperError {
  override readonly exitCode = 4;
}

/** A serial line that is not a usable GGA sentence. Skipped by the reader. */
export class NmeaParseError extends Error {
  constructor(message: string, readonly line: string) {
    super(message);
    this.name = 'NmeaParseError';
  }
}

export function exitCodeFor(err: unknown): number {
  return err instanceof MapperError ? err.exitCode : 1;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
