/**
 * Recipe Metadata Store
 *
 * Read-only map of recipe id -> full record, loaded wholesale from
 * recipe_metadata.jsonl at service start.
 */

import fs from 'fs';
import readline from 'readline';
import { MetadataLine, MetadataLineSchema, RecipeRecord } from '../../types';
import { IndexLoadError } from '../../utils/errors';
import { normalizeIngredients } from '../../utils/normalize';

export interface RawRecipeInput {
  id: number;
  title: string;
  ingredients: string[]; // raw phrases, normalized on the way in
  directions?: string[];
  source?: string;
  link?: string;
}

/**
 * Build a record from raw ingredient phrases.
 * This is the ingestion-side entry to the normalizer; records loaded from
 * metadata files already carry normalized keys.
 */
export function createRecipeRecord(input: RawRecipeInput): RecipeRecord {
  return {
    id: input.id,
    title: input.title,
    ingredients: normalizeIngredients(input.ingredients),
    directions: input.directions ?? [],
    source: input.source ?? '',
    link: input.link ?? '',
  };
}

function recordFromMetadataLine(line: MetadataLine): RecipeRecord {
  return {
    id: line.id,
    title: line.title,
    ingredients: line.ner.filter((key) => key.length > 0),
    directions: line.directions ?? [],
    source: line.source,
    link: line.link,
  };
}

export class MetadataStore {
  private readonly byId = new Map<number, RecipeRecord>();

  constructor(records: Iterable<RecipeRecord> = []) {
    for (const record of records) {
      this.byId.set(record.id, record);
    }
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: number): RecipeRecord | undefined {
    return this.byId.get(id);
  }
}

/**
 * Load recipe_metadata.jsonl (one JSON object per line).
 *
 * @throws IndexLoadError when the file is missing, unreadable or a line is malformed
 */
export async function loadMetadataStore(filePath: string): Promise<MetadataStore> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(filePath);
  } catch (err) {
    throw new IndexLoadError(`Metadata file not found: ${filePath}`, {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (!stats.isFile()) {
    throw new IndexLoadError(`Metadata path is not a file: ${filePath}`, { path: filePath });
  }

  const input = fs.createReadStream(filePath, { encoding: 'utf8' });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });

  const records: RecipeRecord[] = [];
  let lineNumber = 0;

  try {
    for await (const line of rl) {
      lineNumber++;
      if (!line.trim()) continue;
      records.push(parseMetadataLine(line, filePath, lineNumber));
    }
  } catch (err) {
    if (err instanceof IndexLoadError) throw err;
    throw new IndexLoadError(`Failed to read metadata file: ${filePath}`, {
      path: filePath,
      line: lineNumber,
      cause: err instanceof Error ? err.message : String(err),
    });
  } finally {
    rl.close();
    input.destroy();
  }

  return new MetadataStore(records);
}

function parseMetadataLine(line: string, filePath: string, lineNumber: number): RecipeRecord {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    throw new IndexLoadError(`Malformed JSON in ${filePath} at line ${lineNumber}`, {
      path: filePath,
      line: lineNumber,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = MetadataLineSchema.safeParse(json);
  if (!parsed.success) {
    throw new IndexLoadError(`Invalid recipe record in ${filePath} at line ${lineNumber}`, {
      path: filePath,
      line: lineNumber,
      issues: parsed.error.issues,
    });
  }

  return recordFromMetadataLine(parsed.data);
}
