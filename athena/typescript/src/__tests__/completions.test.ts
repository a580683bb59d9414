/**
 * Tests for the static completion list.
 */

import { describe, it, expect } from 'vitest';
import { FUNCTION_TYPE_LABEL, KEYWORD_TYPE_LABEL, loadCompletions } from '../completions/index.js';

describe('loadCompletions', () => {
  it('should load keywords and functions', () => {
    const completions = loadCompletions();

    expect(completions.filter((completion) => completion.typeLabel === KEYWORD_TYPE_LABEL).length).toBeGreaterThan(50);
    expect(completions.find((completion) => completion.value === 'date_trunc')).toEqual({
      label: 'date_trunc',
      typeLabel: FUNCTION_TYPE_LABEL,
      value: 'date_trunc',
      priority: 1000,
      context: null,
    });
  });

  it('should read the file once and return a frozen list', () => {
    const first = loadCompletions();

    expect(loadCompletions()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });
});
