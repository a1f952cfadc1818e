export class TaskValidationError extends Error {
  field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'TaskValidationError';
    this.field = field;
  }
}

export function isTaskValidationError(err: unknown): err is TaskValidationError {
  return err instanceof TaskValidationError;
}
