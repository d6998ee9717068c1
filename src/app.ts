import express, { Express, Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, InvalidInputError } from './utils/errors';
import { createRecipeRoutes } from './routes/recipes';
import { RecipeRetrievalService } from './services/ranking';

export function createApp(service: RecipeRetrievalService): Express {
  const app = express();

  app.use(express.json());

  // Routes
  app.use('/v1/recipes', createRecipeRoutes(service));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      recipes: service.recipeCount,
      ingredients: service.ingredientCount,
      semantic_search: service.semanticAvailable,
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found.',
      },
    });
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      const inputError = new InvalidInputError('Validation failed', {
        issues: err.issues,
      });
      return res.status(inputError.statusCode).json(inputError.toResponse());
    }

    if (err instanceof AppError) {
      return res.status(err.statusCode).json(err.toResponse());
    }

    // Malformed JSON bodies from express.json()
    if (err instanceof SyntaxError) {
      const inputError = new InvalidInputError('Malformed JSON body');
      return res.status(inputError.statusCode).json(inputError.toResponse());
    }

    console.error('[Server] Error:', err);

    // Generic error
    return res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred.',
      },
    });
  });

  return app;
}
