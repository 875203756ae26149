import { describe, it, expect } from 'vitest';
import { generateId } from '../../src/utils/generateId.ts';

describe('generateId', () => {
  it('should return distinct v4 UUIDs', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateId()));

    expect(ids.size).toBe(50);
    for (const id of ids) {
      expect(id).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    }
  });
});
