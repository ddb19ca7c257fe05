import { describe, expect, test } from 'vitest';

import {
  generateNotFoundPath,
  generateNotFoundSlug,
} from '../../../src/services/not-found-baseline.js';

describe('not-found-baseline', () => {
  test('generates six lowercase alphanumerics by default', () => {
    expect(generateNotFoundSlug()).toMatch(/^[a-z\d]{6}$/);
  });

  test('honours a custom length', () => {
    expect(generateNotFoundSlug(12)).toMatch(/^[a-z\d]{12}$/);
  });

  test('builds an html page name', () => {
    expect(generateNotFoundPath()).toMatch(/^[a-z\d]{6}\.html$/);
  });

  test('produces different paths across calls', () => {
    const paths = new Set(
      Array.from({ length: 20 }, () => generateNotFoundPath())
    );

    expect(paths.size).toBeGreaterThan(1);
  });
});
