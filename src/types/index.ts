import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Persisted file schemas (validated at the load boundary)
// ─────────────────────────────────────────────────────────────────────────────

export const RecipeIdSchema = z.union([
  z.number().int(),
  z.string().regex(/^-?\d+$/).transform((value) => Number.parseInt(value, 10)),
]);

/**
 * One line of recipe_metadata.jsonl.
 * `ner` holds the already-normalized ingredient keys.
 */
export const MetadataLineSchema = z.object({
  id: RecipeIdSchema,
  title: z.string().default(''),
  link: z.string().nullable().default('').transform((value) => value ?? ''),
  source: z.string().nullable().default('').transform((value) => value ?? ''),
  ner: z.array(z.string()).default([]),
  directions: z.array(z.string()).optional(),
});

/** ingredient_index.json: ingredient key -> recipe ids */
export const IngredientIndexFileSchema = z.record(z.string(), z.array(RecipeIdSchema));

/** Pantry snapshot file: the inventory the server reads when callers send no pantry */
export const PantrySnapshotSchema = z.array(
  z.object({
    ingredient_name: z.string().min(1),
    quantity: z.number().nonnegative().default(1),
    unit: z.string().optional(),
    expiration_date: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/)
      .nullable()
      .default(null),
  })
);

export type MetadataLine = z.infer<typeof MetadataLineSchema>;
export type IngredientIndexFile = z.infer<typeof IngredientIndexFileSchema>;
export type PantrySnapshot = z.infer<typeof PantrySnapshotSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// API Request schemas using Zod
// ─────────────────────────────────────────────────────────────────────────────

const PantryItemsSchema = z.array(z.string());

export const RecipeSearchRequestSchema = z.object({
  pantry_items: PantryItemsSchema.optional(),
  query: z.string().optional(),
  top_k: z.number().int().min(1).max(500).default(10),
  allow_missing: z.number().int().default(0),
  use_semantic: z.boolean().default(true),
});

export const ExactMatchRequestSchema = z.object({
  pantry_items: PantryItemsSchema,
  allow_missing: z.number().int().default(0),
  top_k: z.number().int().min(1).max(500).default(10),
});

export const SemanticSearchRequestSchema = z.object({
  query: z.string().optional(),
  pantry_items: PantryItemsSchema.optional(),
  k: z.number().int().min(1).max(500).default(10),
});

export const FeasibilityRequestSchema = z.object({
  pantry_items: PantryItemsSchema.optional(),
  allow_missing: z.number().int().default(0),
});

export type RecipeSearchRequest = z.infer<typeof RecipeSearchRequestSchema>;
export type ExactMatchRequest = z.infer<typeof ExactMatchRequestSchema>;
export type SemanticSearchRequest = z.infer<typeof SemanticSearchRequestSchema>;
export type FeasibilityRequest = z.infer<typeof FeasibilityRequestSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Internal Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RecipeRecord {
  id: number;
  title: string;
  ingredients: string[]; // normalized keys, may repeat
  directions: string[];
  source: string;
  link: string;
}

/** Output of the exact-match ranker */
export interface CandidateScore {
  recipeId: number;
  score: number;
  used: number;       // unique pantry keys the recipe uses
  missing: string[];  // recipe keys not in the pantry
}

export interface SemanticHit {
  recipeId: number;
  similarity: number; // cosine similarity, [-1, 1]
}

/**
 * Why a semantic search did or did not produce hits.
 * Callers outside the ranking layer only ever see the hit list.
 */
export type SemanticOutcome =
  | { status: 'ok'; hits: SemanticHit[] }
  | { status: 'no_input' }
  | { status: 'unavailable'; reason: string }
  | { status: 'failed'; error: unknown };

export interface HybridResult {
  recipe: RecipeRecord;
  score: number;
  used: number;
  missing: string[];
  expiringUsed: string[]; // pantry keys used that expire soon (provider pantry only)
}

/** Whether one recipe can be cooked from the pantry within a missing-ingredient allowance */
export interface FeasibilityReport {
  recipeId: number;
  feasible: boolean;
  available: string[];
  missing: string[];
  numAvailable: number;
  numMissing: number;
}

export interface HybridRankOptions {
  pantryItems?: string[];
  queryText?: string;
  topK?: number;
  allowMissing?: number;
  useSemantic?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pantry + Vector Backend Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PantryItem {
  ingredientName: string;
  quantity: number;
  unit?: string;
  expirationDate: string | null; // YYYY-MM-DD
}

export interface VectorPoint {
  id: number;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface VectorMatch {
  id: number;
  score: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// API Response Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RecipeResponse {
  id: number;
  title: string;
  ingredients: string[];
  directions: string[];
  source: string;
  link: string;
}

export interface RankedRecipeResponse extends RecipeResponse {
  score: number;
  num_pantry_used: number;
  missing_ingredients: string[];
  match_percentage: number;
  expiring_used: string[];
}

export interface FeasibilityResponse {
  recipe_id: number;
  feasible: boolean;
  available: string[];
  missing: string[];
  num_available: number;
  num_missing: number;
}

export interface ApiError {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  RECIPE_NOT_FOUND: 'RECIPE_NOT_FOUND',
  INDEX_LOAD_FAILED: 'INDEX_LOAD_FAILED',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;
