import { describe, it, expect } from 'vitest';
import { SiblingOrderSource, nextSiblingOrder, resolveSiblingOrder } from '../src/modules/hierarchy';

const sourceWith = (orders: Record<string, number>): SiblingOrderSource => ({
  maxSiblingOrder: async (scopeId, parentId) => orders[`${scopeId}:${parentId ?? 'root'}`] ?? 0,
});

describe('nextSiblingOrder', () => {
  it('starts at 1 for the first sibling', async () => {
    expect(await nextSiblingOrder(sourceWith({}), 1, null)).toBe(1);
  });

  it('continues after the highest existing order', async () => {
    const source = sourceWith({ '1:root': 3, '1:7': 9 });
    expect(await nextSiblingOrder(source, 1, null)).toBe(4);
    expect(await nextSiblingOrder(source, 1, 7)).toBe(10);
    expect(await nextSiblingOrder(source, 2, null)).toBe(1);
  });
});

describe('resolveSiblingOrder', () => {
  it('prefers an explicit order, including 0', async () => {
    const source = sourceWith({ '1:root': 3 });
    expect(await resolveSiblingOrder(0, source, 1, null)).toBe(0);
    expect(await resolveSiblingOrder(42, source, 1, null)).toBe(42);
  });

  it('allocates when none is given', async () => {
    const source = sourceWith({ '1:root': 3 });
    expect(await resolveSiblingOrder(undefined, source, 1, null)).toBe(4);
    expect(await resolveSiblingOrder(null, source, 1, null)).toBe(4);
  });
});
