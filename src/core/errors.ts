/**
 * Errors that may cross a service boundary. Each carries the HTTP status the
 * web layer answers with.
 */
export class ChatError extends Error {
  constructor(message: string, readonly status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends ChatError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 404);
  }
}

export class PersistenceError extends ChatError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
  }
}

export class ConflictError extends ChatError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class ValidationError extends ChatError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class UnauthorizedError extends ChatError {
  constructor(message = 'Not authenticated') {
    super(message, 401);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
