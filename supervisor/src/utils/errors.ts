export class TaskNotFoundError extends Error {
  constructor(readonly taskId: number) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

/**
 * Operation attempted in a state that does not allow it, e.g. removing a
 * task that is still downloading.
 */
export class InvalidOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOperationError';
  }
}

export class InvalidTaskConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTaskConfigError';
  }
}

export class DirectoryCreationError extends Error {
  constructor(readonly directory: string, cause: unknown) {
    super(`Cannot create output directory ${directory}: ${errorMessage(cause)}`, { cause });
    this.name = 'DirectoryCreationError';
  }
}

export class ProgressParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProgressParseError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
