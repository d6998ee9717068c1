import { describe, it, expect } from 'vitest';
import { normalizeIngredient, normalizeIngredients } from '../src/utils/normalize';

describe('normalizeIngredient', () => {
  it('strips quantity phrases and lower-cases', () => {
    expect(normalizeIngredient('2 cups Flour')).toBe('flour');
    expect(normalizeIngredient('flour')).toBe('flour');
  });

  it('handles metric and spoon units', () => {
    expect(normalizeIngredient('100 g sugar')).toBe('sugar');
    expect(normalizeIngredient('1/2 tsp. salt')).toBe('salt');
    expect(normalizeIngredient('3 TBSP Butter')).toBe('butter');
    expect(normalizeIngredient('8 oz cream cheese')).toBe('cream cheese');
  });

  it('strips quantities written in non-ASCII digits', () => {
    expect(normalizeIngredient('２ cups flour')).toBe('flour');
    expect(normalizeIngredient('١٠٠ g sugar')).toBe('sugar');
  });

  it('strips punctuation inside the phrase', () => {
    expect(normalizeIngredient('Olive Oil, extra-virgin')).toBe('olive oil extravirgin');
  });

  it('singularizes with the suffix rules', () => {
    expect(normalizeIngredient('Eggs')).toBe('egg');
    expect(normalizeIngredient('Tomatoes')).toBe('tomato');
    expect(normalizeIngredient('MILK')).toBe('milk');
    expect(normalizeIngredient('peas')).toBe('pea');
    // too short to strip
    expect(normalizeIngredient('gas')).toBe('gas');
  });

  it('keeps the known false positive on non-plural words', () => {
    expect(normalizeIngredient('Hummus')).toBe('hummu');
  });

  it('returns an empty key for degenerate input', () => {
    expect(normalizeIngredient('')).toBe('');
    expect(normalizeIngredient('   ')).toBe('');
    expect(normalizeIngredient(' !!! ')).toBe('');
    expect(normalizeIngredient('2 cups')).toBe('');
  });

  it('is idempotent on its own output', () => {
    const inputs = [
      '2 cups Flour',
      'Eggs',
      'Tomatoes',
      '1/2 tsp. salt',
      '100 g sugar',
      'Hummus',
      'Fresh Basil Leaves',
      'soy sauce',
    ];
    for (const input of inputs) {
      const once = normalizeIngredient(input);
      expect(normalizeIngredient(once)).toBe(once);
    }
  });
});

describe('normalizeIngredients', () => {
  it('drops empty keys and keeps order and duplicates', () => {
    expect(normalizeIngredients(['Eggs', '', '2 cups', 'milk', 'egg'])).toEqual([
      'egg',
      'milk',
      'egg',
    ]);
  });
});
