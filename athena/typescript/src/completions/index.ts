/**
 * Static keyword and function completions for the Athena SQL dialect.
 *
 * @module athena-catalog/completions
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { Completion } from '../types/index.js';

export const KEYWORD_TYPE_LABEL = 'kw';
export const FUNCTION_TYPE_LABEL = 'fn';
export const KEYWORD_PRIORITY = 100;
export const FUNCTION_PRIORITY = 1000;

const completionFileSchema = z.object({
  keywords: z.array(z.string()),
  functions: z.array(z.string()),
});

let cached: readonly Completion[] | undefined;

/**
 * Loads the completion list shipped with the package. The file is read once.
 */
export function loadCompletions(): readonly Completion[] {
  if (cached) {
    return cached;
  }

  const file = new URL('./athena-completions.json', import.meta.url);
  const data = completionFileSchema.parse(JSON.parse(readFileSync(file, 'utf8')));

  const keywords = data.keywords.map((keyword) =>
    Object.freeze({
      label: keyword.toLowerCase(),
      typeLabel: KEYWORD_TYPE_LABEL,
      value: keyword,
      priority: KEYWORD_PRIORITY,
      context: null,
    })
  );
  const functions = data.functions.map((name) =>
    Object.freeze({
      label: name,
      typeLabel: FUNCTION_TYPE_LABEL,
      value: name,
      priority: FUNCTION_PRIORITY,
      context: null,
    })
  );

  cached = Object.freeze([...keywords, ...functions]);
  return cached;
}
