import { Router, Request, Response, NextFunction } from 'express';
import {
  ExactMatchRequestSchema,
  FeasibilityReport,
  FeasibilityRequestSchema,
  FeasibilityResponse,
  HybridResult,
  RankedRecipeResponse,
  RecipeRecord,
  RecipeResponse,
  RecipeSearchRequestSchema,
  SemanticSearchRequestSchema,
} from '../types';
import { RecipeRetrievalService } from '../services/ranking';
import { InvalidInputError, RecipeNotFoundError } from '../utils/errors';

function toRecipeResponse(recipe: RecipeRecord): RecipeResponse {
  return {
    id: recipe.id,
    title: recipe.title,
    ingredients: recipe.ingredients,
    directions: recipe.directions,
    source: recipe.source,
    link: recipe.link,
  };
}

function toRankedResponse(result: HybridResult): RankedRecipeResponse {
  const ingredientCount = new Set(result.recipe.ingredients).size;
  return {
    ...toRecipeResponse(result.recipe),
    score: result.score,
    num_pantry_used: result.used,
    missing_ingredients: result.missing,
    match_percentage: ingredientCount > 0 ? Math.round((result.used / ingredientCount) * 100) : 0,
    expiring_used: result.expiringUsed,
  };
}

function toFeasibilityResponse(report: FeasibilityReport): FeasibilityResponse {
  return {
    recipe_id: report.recipeId,
    feasible: report.feasible,
    available: report.available,
    missing: report.missing,
    num_available: report.numAvailable,
    num_missing: report.numMissing,
  };
}

function parseRecipeId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidInputError('Recipe id must be a non-negative integer', { id: raw });
  }
  return Number.parseInt(raw, 10);
}

export function createRecipeRoutes(service: RecipeRetrievalService): Router {
  const router = Router();

  // POST /v1/recipes/search - Hybrid pantry + preference ranking
  router.post('/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = RecipeSearchRequestSchema.parse(req.body ?? {});

      const results = await service.hybridRank({
        pantryItems: body.pantry_items,
        queryText: body.query,
        topK: body.top_k,
        allowMissing: body.allow_missing,
        useSemantic: body.use_semantic,
      });

      res.json({
        recipes: results.map(toRankedResponse),
        total_results: results.length,
      });
    } catch (err) {
      next(err);
    }
  });

  // POST /v1/recipes/exact - Pantry overlap ranking only
  router.post('/exact', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = ExactMatchRequestSchema.parse(req.body ?? {});
      const candidates = service.exactMatchRank(body.pantry_items, body.allow_missing, body.top_k);

      res.json({
        candidates: candidates.map((candidate) => ({
          id: candidate.recipeId,
          score: candidate.score,
          num_pantry_used: candidate.used,
          missing_ingredients: candidate.missing,
        })),
      });
    } catch (err) {
      next(err);
    }
  });

  // POST /v1/recipes/semantic - Embedding similarity ranking only
  router.post('/semantic', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = SemanticSearchRequestSchema.parse(req.body ?? {});
      const hits = await service.semanticRank(body.query, body.pantry_items, body.k);

      res.json({
        hits: hits.map((hit) => ({ id: hit.recipeId, similarity: hit.similarity })),
      });
    } catch (err) {
      next(err);
    }
  });

  // GET /v1/recipes/:id - Get a specific recipe
  router.get('/:id', (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const id = parseRecipeId(req.params.id);
      const recipe = service.getRecipe(id);
      if (!recipe) {
        throw new RecipeNotFoundError(id);
      }

      res.json(toRecipeResponse(recipe));
    } catch (err) {
      next(err);
    }
  });

  // POST /v1/recipes/:id/feasibility - Can this recipe be cooked from the pantry?
  router.post(
    '/:id/feasibility',
    async (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
      try {
        const id = parseRecipeId(req.params.id);
        const body = FeasibilityRequestSchema.parse(req.body ?? {});

        const report = await service.checkFeasibility(id, body.allow_missing, body.pantry_items);
        if (!report) {
          throw new RecipeNotFoundError(id);
        }

        res.json(toFeasibilityResponse(report));
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
