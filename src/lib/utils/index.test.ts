import { describe, expect, it } from 'vitest';
import { generateId, inchToMM } from './index';

describe('inchToMM', () => {
  it('converts inch to millimeter', () => {
    expect(inchToMM(2)).toBe(50.8);
  });
});

describe('generateId', () => {
  it('creates distinct v4 UUIDs', () => {
    const a = generateId();
    expect(a).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(generateId()).not.toBe(a);
  });
});
