/**
 * How one entity encodes its tree in a flat table.
 *
 * Categories: "1/27/105/" (trailing delimiter), root depth 1, max depth 4.
 * Comments:   "100/101/102" (no trailing delimiter), root depth 0, max depth 3.
 */
export interface PathStyle {
  entity: 'category' | 'comment';
  delimiter: string;
  trailingDelimiter: boolean;
  rootDepth: number;
  maxDepth: number;
}

export const CATEGORY_PATH_STYLE = {
  entity: 'category',
  delimiter: '/',
  trailingDelimiter: true,
  rootDepth: 1,
  maxDepth: 4,
} as const satisfies PathStyle;

export const COMMENT_PATH_STYLE = {
  entity: 'comment',
  delimiter: '/',
  trailingDelimiter: false,
  rootDepth: 0,
  maxDepth: 3,
} as const satisfies PathStyle;

/**
 * The part of a row every hierarchy operation needs
 */
export interface PathNode {
  depth: number;
  path: string;
}

/**
 * Parent as seen by DepthGuard
 */
export interface ParentState extends PathNode {
  deleted: boolean;
}

export interface TreeAccessors<T> {
  id: (node: T) => number;
  parentId: (node: T) => number | null;
}
