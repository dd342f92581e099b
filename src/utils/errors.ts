export class AppError extends Error {
  public readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Malformed or out-of-range input. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** A referenced row does not exist. */
export class NotFoundError extends AppError {
  constructor(entity: string, id?: number | string) {
    super(id === undefined ? `${entity} not found` : `${entity} ${id} not found`, 404);
  }
}

/** Uniqueness clash, or a delete blocked by dependent rows. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class StorageUnavailableError extends AppError {
  constructor(message = "Database is unavailable") {
    super(message, 503);
  }
}

export const isAppError = (error: unknown): error is AppError =>
  error instanceof AppError;
