import { PathStyle } from './hierarchy.types';

/**
 * Stands in for the node's own id until storage has generated it
 */
export const PLACEHOLDER_ID = 0;

/**
 * Final path of a node: parent path plus its own id.
 *
 *   category: composePath(style, '1/27/', 105) === '1/27/105/'
 *   comment:  composePath(style, '100/101', 102) === '100/101/102'
 */
export const composePath = (style: PathStyle, parentPath: string | null, id: number): string => {
  if (style.trailingDelimiter) {
    return `${parentPath ?? ''}${id}${style.delimiter}`;
  }
  return parentPath ? `${parentPath}${style.delimiter}${id}` : String(id);
};

export const placeholderPath = (style: PathStyle, parentPath: string | null): string =>
  composePath(style, parentPath, PLACEHOLDER_ID);

export const parsePath = (style: PathStyle, path: string): number[] =>
  path
    .split(style.delimiter)
    .filter(segment => segment.length > 0)
    .map(segment => Number(segment))
    .filter(id => Number.isInteger(id));

export const segmentCount = (style: PathStyle, path: string): number =>
  path.split(style.delimiter).filter(segment => segment.length > 0).length;

/**
 * Depth is derived from the path, never stored independently of it
 */
export const depthFromPath = (style: PathStyle, path: string): number =>
  segmentCount(style, path) - 1 + style.rootDepth;

/**
 * Prefix every descendant path starts with. Always ends on a delimiter so
 * that comment "100" does not claim "1000/..." as a child.
 */
export const subtreePrefix = (style: PathStyle, path: string): string =>
  path.endsWith(style.delimiter) ? path : `${path}${style.delimiter}`;

export const isInSubtree = (style: PathStyle, rootPath: string, candidatePath: string): boolean =>
  candidatePath === rootPath || candidatePath.startsWith(subtreePrefix(style, rootPath));

export interface TwoPhaseCreate<T> {
  /** Phase 1: persist the row with a placeholder path; storage generates the id */
  insert: (placeholder: string, depth: number) => Promise<T>;
  idOf: (row: T) => number;
  /** Phase 2: patch the row with its real path */
  patchPath: (row: T, path: string) => Promise<T>;
}

/**
 * Insert-then-patch creation. The caller is expected to run this inside a
 * storage transaction so both writes commit or neither does.
 */
export const createWithMaterializedPath = async <T>(
  style: PathStyle,
  parentPath: string | null,
  writer: TwoPhaseCreate<T>
): Promise<T> => {
  const temporary = placeholderPath(style, parentPath);
  const inserted = await writer.insert(temporary, depthFromPath(style, temporary));
  const finalPath = composePath(style, parentPath, writer.idOf(inserted));
  return writer.patchPath(inserted, finalPath);
};
