/**
 * Service configuration, read once from the environment at boot.
 */

import path from 'path';
import { z } from 'zod';
import { ConfigError } from './utils/errors';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  DATA_DIR: z.string().default('data'),
  METADATA_PATH: optionalString,
  INGREDIENT_INDEX_PATH: optionalString,
  PANTRY_PATH: optionalString,

  OPENAI_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),

  QDRANT_URL: optionalString,
  QDRANT_API_KEY: optionalString,
  QDRANT_COLLECTION: z.string().default('recipes'),

  SEMANTIC_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  CANDIDATE_POOL_SIZE: z.coerce.number().int().positive().default(500),
  EXPIRING_WITHIN_DAYS: z.coerce.number().int().min(0).default(3),
  HYBRID_INCLUDE_SEMANTIC_ONLY: booleanFlag,
});

export interface VectorBackendConfig {
  openaiApiKey: string;
  embeddingModel: string;
  embeddingDimensions: number;
  qdrantUrl: string;
  qdrantApiKey?: string;
  collectionName: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  metadataPath: string;
  ingredientIndexPath: string;
  /** Pantry snapshot read at boot; undefined leaves auto-fill without a pantry */
  pantryPath?: string;
  /** null when the vector backend is not configured */
  vector: VectorBackendConfig | null;
  candidatePoolSize: number;
  expiringWithinDays: number;
  includeSemanticOnly: boolean;
}

/**
 * Parse configuration from environment variables.
 *
 * Semantic search is only configured when both QDRANT_URL and OPENAI_API_KEY
 * are set; everything else has a default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', {
      issues: parsed.error.issues,
    });
  }

  const vars = parsed.data;
  const vector: VectorBackendConfig | null =
    vars.QDRANT_URL && vars.OPENAI_API_KEY
      ? {
          openaiApiKey: vars.OPENAI_API_KEY,
          embeddingModel: vars.EMBEDDING_MODEL,
          embeddingDimensions: vars.EMBEDDING_DIMENSIONS,
          qdrantUrl: vars.QDRANT_URL,
          qdrantApiKey: vars.QDRANT_API_KEY,
          collectionName: vars.QDRANT_COLLECTION,
          timeoutMs: vars.SEMANTIC_TIMEOUT_MS,
        }
      : null;

  return {
    port: vars.PORT,
    metadataPath: vars.METADATA_PATH ?? path.join(vars.DATA_DIR, 'recipe_metadata.jsonl'),
    ingredientIndexPath:
      vars.INGREDIENT_INDEX_PATH ?? path.join(vars.DATA_DIR, 'ingredient_index.json'),
    pantryPath: vars.PANTRY_PATH,
    vector,
    candidatePoolSize: vars.CANDIDATE_POOL_SIZE,
    expiringWithinDays: vars.EXPIRING_WITHIN_DAYS,
    includeSemanticOnly: vars.HYBRID_INCLUDE_SEMANTIC_ONLY,
  };
}
