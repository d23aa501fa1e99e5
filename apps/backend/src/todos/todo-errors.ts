export class TodoNotFoundError extends Error {
  readonly todoId: number;

  constructor(todoId: number) {
    super(`No todo found with ID ${todoId}`);
    this.name = "TodoNotFoundError";
    this.todoId = todoId;
  }
}

export class TodoValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TodoValidationError";
  }
}

export function isTodoNotFoundError(error: unknown): error is TodoNotFoundError {
  return error instanceof TodoNotFoundError;
}

export function isTodoValidationError(error: unknown): error is TodoValidationError {
  return error instanceof TodoValidationError;
}
