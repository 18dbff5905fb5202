/**
 * Failure kinds surfaced to the CLI.
 * Nothing here is retried; cron re-running the tool is the recovery path.
 */

export class AcquisitionError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = 'AcquisitionError';
  }
}

/** Search returned nothing */
export class NotFoundError extends AcquisitionError {
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Login failed, or a download needs a login that has not happened */
export class AuthError extends AcquisitionError {
  readonly exitCode = 3;

  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

export class AuthRequiredError extends AuthError {
  constructor(title: string) {
    super(`Authentication required: "${title}" in HD needs a premium session. Run einthusan-login first, or pick --quality sd.`);
    this.name = 'AuthRequiredError';
  }
}

export class DownloadError extends AcquisitionError {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'DownloadError';
  }
}

/** Radarr could not be reached or refused us; the whole sync run stops */
export class RadarrUnavailableError extends AcquisitionError {
  readonly exitCode = 5;

  constructor(message: string) {
    super(message);
    this.name = 'RadarrUnavailableError';
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof AcquisitionError ? error.exitCode : 1;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
