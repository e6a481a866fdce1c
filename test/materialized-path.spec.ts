import { describe, it, expect, vi } from 'vitest';
import {
  CATEGORY_PATH_STYLE,
  COMMENT_PATH_STYLE,
  PLACEHOLDER_ID,
  composePath,
  createWithMaterializedPath,
  depthFromPath,
  isInSubtree,
  parsePath,
  placeholderPath,
  segmentCount,
  subtreePrefix,
} from '../src/modules/hierarchy';

describe('composePath', () => {
  it('ends category paths with the delimiter', () => {
    expect(composePath(CATEGORY_PATH_STYLE, null, 1)).toBe('1/');
    expect(composePath(CATEGORY_PATH_STYLE, '1/27/', 105)).toBe('1/27/105/');
  });

  it('joins comment paths without a trailing delimiter', () => {
    expect(composePath(COMMENT_PATH_STYLE, null, 100)).toBe('100');
    expect(composePath(COMMENT_PATH_STYLE, '100/101', 102)).toBe('100/101/102');
  });

  it('uses 0 as the placeholder id', () => {
    expect(PLACEHOLDER_ID).toBe(0);
    expect(placeholderPath(CATEGORY_PATH_STYLE, '1/')).toBe('1/0/');
    expect(placeholderPath(COMMENT_PATH_STYLE, null)).toBe('0');
  });
});

describe('parsePath / depthFromPath', () => {
  it('ignores empty segments', () => {
    expect(parsePath(CATEGORY_PATH_STYLE, '1/27/105/')).toEqual([1, 27, 105]);
    expect(parsePath(COMMENT_PATH_STYLE, '100/101')).toEqual([100, 101]);
    expect(segmentCount(CATEGORY_PATH_STYLE, '1/27/105/')).toBe(3);
  });

  it('derives depth from the segment count and the root depth', () => {
    expect(depthFromPath(CATEGORY_PATH_STYLE, '1/')).toBe(1);
    expect(depthFromPath(CATEGORY_PATH_STYLE, '1/27/105/200/')).toBe(4);
    expect(depthFromPath(COMMENT_PATH_STYLE, '100')).toBe(0);
    expect(depthFromPath(COMMENT_PATH_STYLE, '100/101/102/103')).toBe(3);
  });
});

describe('subtree matching', () => {
  it('stops the prefix at a segment boundary', () => {
    expect(subtreePrefix(COMMENT_PATH_STYLE, '100')).toBe('100/');
    expect(subtreePrefix(CATEGORY_PATH_STYLE, '1/27/')).toBe('1/27/');
  });

  it('does not confuse comment 100 with comment 1000', () => {
    expect(isInSubtree(COMMENT_PATH_STYLE, '100', '100/101')).toBe(true);
    expect(isInSubtree(COMMENT_PATH_STYLE, '100', '100')).toBe(true);
    expect(isInSubtree(COMMENT_PATH_STYLE, '100', '1000')).toBe(false);
    expect(isInSubtree(COMMENT_PATH_STYLE, '100', '1000/1001')).toBe(false);
  });

  it('matches category descendants only', () => {
    expect(isInSubtree(CATEGORY_PATH_STYLE, '1/', '1/2/3/')).toBe(true);
    expect(isInSubtree(CATEGORY_PATH_STYLE, '1/', '11/')).toBe(false);
  });
});

describe('createWithMaterializedPath', () => {
  it('inserts with a placeholder and patches the real path', async () => {
    const insert = vi.fn(async (path: string, depth: number) => ({ id: 105, path, depth }));
    const patchPath = vi.fn(async (row: { id: number; path: string; depth: number }, path: string) => ({ ...row, path }));

    const row = await createWithMaterializedPath(CATEGORY_PATH_STYLE, '1/27/', {
      insert,
      idOf: inserted => inserted.id,
      patchPath,
    });

    expect(insert).toHaveBeenCalledWith('1/27/0/', 3);
    expect(patchPath).toHaveBeenCalledTimes(1);
    expect(row).toEqual({ id: 105, path: '1/27/105/', depth: 3 });
  });

  it('creates a top-level comment at depth 0', async () => {
    const row = await createWithMaterializedPath(COMMENT_PATH_STYLE, null, {
      insert: async (path, depth) => ({ id: 100, path, depth }),
      idOf: inserted => inserted.id,
      patchPath: async (inserted, path) => ({ ...inserted, path }),
    });

    expect(row).toEqual({ id: 100, path: '100', depth: 0 });
  });

  it('propagates a failed patch', async () => {
    await expect(
      createWithMaterializedPath(COMMENT_PATH_STYLE, '100', {
        insert: async (path, depth) => ({ id: 101, path, depth }),
        idOf: inserted => inserted.id,
        patchPath: async () => {
          throw new Error('patch failed');
        },
      })
    ).rejects.toThrow('patch failed');
  });
});
