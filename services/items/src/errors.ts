/** Failure reported by the SQLite store for a single statement. */
export class StorageError extends Error {
  readonly code: string | undefined;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
    this.code = sqliteCode(cause);
  }
}

export type StartupStage = 'open' | 'ping' | 'schema';

/** The store could not be brought up; the process should not start serving. */
export class StartupError extends Error {
  readonly stage: StartupStage;

  constructor(stage: StartupStage, message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'StartupError';
    this.stage = stage;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sqliteCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
