/**
 * Pantry Inventory Provider
 *
 * The pantry store itself lives outside the retrieval core. Ranking only
 * needs to read the current inventory when a caller omits pantry items,
 * and to know which of those items are about to expire.
 */

import fs from 'fs';
import { differenceInCalendarDays, isValid, parseISO, startOfDay } from 'date-fns';
import { PantryItem, PantrySnapshotSchema } from '../../types';
import { IndexLoadError } from '../../utils/errors';
import { normalizeIngredient } from '../../utils/normalize';

export interface PantryInventoryProvider {
  getInventory(): Promise<PantryItem[]>;
}

/**
 * Days until an item expires, relative to the start of `now`'s day.
 *
 * @returns null when the item has no (valid) expiration date
 */
export function daysUntilExpiration(item: PantryItem, now: Date): number | null {
  if (!item.expirationDate) return null;
  const expiresOn = parseISO(item.expirationDate);
  if (!isValid(expiresOn)) return null;
  return differenceInCalendarDays(expiresOn, startOfDay(now));
}

/**
 * Items expiring within `withinDays` (inclusive), soonest first.
 * Already-expired items are excluded; they should not be cooked.
 */
export function filterExpiringSoon(items: PantryItem[], withinDays: number, now: Date): PantryItem[] {
  const expiring: Array<{ item: PantryItem; days: number }> = [];
  for (const item of items) {
    const days = daysUntilExpiration(item, now);
    if (days === null || days < 0 || days > withinDays) continue;
    expiring.push({ item, days });
  }
  return expiring.sort((a, b) => a.days - b.days).map((entry) => entry.item);
}

/** Normalized keys of items expiring within the window. */
export function expiringIngredientKeys(items: PantryItem[], withinDays: number, now: Date): Set<string> {
  const keys = new Set<string>();
  for (const item of filterExpiringSoon(items, withinDays, now)) {
    const key = normalizeIngredient(item.ingredientName);
    if (key) keys.add(key);
  }
  return keys;
}

export class InMemoryPantryProvider implements PantryInventoryProvider {
  private readonly items: PantryItem[];

  constructor(items: PantryItem[] = []) {
    this.items = [...items];
  }

  async getInventory(): Promise<PantryItem[]> {
    return [...this.items];
  }
}

export interface ResolvedPantry {
  items: string[];
  /** Normalized keys of provider items expiring within the window */
  expiring: Set<string>;
}

/**
 * Pantry to rank against: the caller's items when given, otherwise the
 * provider's inventory. Caller items carry no dates, so nothing is expiring.
 * A missing or failing provider resolves to an empty pantry.
 */
export async function resolvePantry(
  provider: PantryInventoryProvider | null,
  pantryItems: string[] | undefined,
  expiringWithinDays: number,
  now: Date
): Promise<ResolvedPantry> {
  if (pantryItems !== undefined) {
    return { items: pantryItems, expiring: new Set() };
  }

  if (!provider) {
    console.warn('[Pantry] No pantry items provided and no pantry provider connected');
    return { items: [], expiring: new Set() };
  }

  let inventory: PantryItem[];
  try {
    inventory = await provider.getInventory();
  } catch (error) {
    console.error('[Pantry] Failed to read pantry inventory:', error);
    return { items: [], expiring: new Set() };
  }

  return {
    items: inventory.map((item) => item.ingredientName),
    expiring: expiringIngredientKeys(inventory, expiringWithinDays, now),
  };
}

/**
 * Read a pantry snapshot (JSON array of inventory rows) at boot.
 *
 * @throws IndexLoadError when the file is unreadable or malformed
 */
export async function loadPantrySnapshot(filePath: string): Promise<PantryItem[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf8');
  } catch (err) {
    throw new IndexLoadError(`Pantry snapshot not found: ${filePath}`, {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new IndexLoadError(`Malformed JSON in pantry snapshot: ${filePath}`, {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = PantrySnapshotSchema.safeParse(json);
  if (!parsed.success) {
    throw new IndexLoadError(`Invalid pantry snapshot: ${filePath}`, {
      path: filePath,
      issues: parsed.error.issues,
    });
  }

  return parsed.data.map((row) => ({
    ingredientName: row.ingredient_name,
    quantity: row.quantity,
    ...(row.unit !== undefined ? { unit: row.unit } : {}),
    expirationDate: row.expiration_date,
  }));
}
