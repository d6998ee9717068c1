import { ErrorCodes, ApiError } from '../types';

export class AppError extends Error {
  constructor(
    public code: keyof typeof ErrorCodes,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toResponse(): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 400, details);
  }
}

export class RecipeNotFoundError extends AppError {
  constructor(recipeId: number) {
    super('RECIPE_NOT_FOUND', `Recipe with ID ${recipeId} not found.`, 404, { recipeId });
  }
}

/**
 * A persisted metadata or ingredient-index file is missing or malformed.
 * Only raised while loading, never while ranking.
 */
export class IndexLoadError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INDEX_LOAD_FAILED', message, 500, details);
    this.name = 'IndexLoadError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CONFIG', message, 500, details);
    this.name = 'ConfigError';
  }
}
