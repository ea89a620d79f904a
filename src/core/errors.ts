export interface DocumentIssue {
  /** Dotted location inside the task document, e.g. `tasks.build.run`. */
  path: string;
  message: string;
}

export class TaskFileNotFoundError extends Error {
  constructor(public readonly taskFile: string) {
    super(`${taskFile} doesn't exist`);
    this.name = 'TaskFileNotFoundError';
  }
}

export class DocumentInvalidError extends Error {
  constructor(
    public readonly issues: DocumentIssue[],
    public readonly taskFile?: string,
  ) {
    super(`Task document is invalid (${issues.length} issue${issues.length === 1 ? '' : 's'})`);
    this.name = 'DocumentInvalidError';
  }
}

export class UndefinedVariableError extends Error {
  constructor(public readonly variable: string) {
    super(`Variable ${variable} doesn't exist`);
    this.name = 'UndefinedVariableError';
  }
}

export class InvalidWorkingDirectoryError extends Error {
  constructor(public readonly cwd: string) {
    super(`Working directory ${cwd} doesn't exist or is not a directory`);
    this.name = 'InvalidWorkingDirectoryError';
  }
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
