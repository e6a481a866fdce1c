import { Queryable, pool, withTransaction } from '../../connections/db/connection';
import { Comment, CommentPatch, NewCommentRecord } from '../../connections/db/models/comment.model';
import { DescendantScan, SiblingOrderSource } from '../hierarchy';
import { SqlQuery, WhereBuilder } from '../../utils/sql';

/**
 * Storage for comments. Trees are scoped by post.
 */
export interface CommentRepository extends SiblingOrderSource {
  transaction<T>(work: (repo: CommentRepository) => Promise<T>): Promise<T>;
  insert(record: NewCommentRecord): Promise<Comment>;
  updatePath(commentId: number, path: string): Promise<Comment>;
  findById(commentId: number): Promise<Comment | null>;
  findByIds(postId: number, commentIds: number[]): Promise<Comment[]>;
  findByPost(postId: number, includeDeleted: boolean): Promise<Comment[]>;
  findDescendants(postId: number, scan: DescendantScan, includeDeleted: boolean): Promise<Comment[]>;
  countByPost(postId: number, includeDeleted: boolean): Promise<number>;
  update(commentId: number, patch: CommentPatch): Promise<Comment | null>;
  delete(commentId: number): Promise<boolean>;
}

const selectCommentsFrom = (source: string): string => `SELECT c.id, c.post_id, c.parent_id, c.author_id, c.content,
    c.depth, c.path, c.order_num, c.is_deleted, c.password_hash, c.created_at, c.updated_at,
    u.username AS author_username
  FROM ${source} c
  LEFT JOIN users u ON u.id = c.author_id`;

const COMMENT_SELECT = selectCommentsFrom('comments');

// Writes read their row back with the author's username, same shape as COMMENT_SELECT
const withAuthor = (statement: string): string => `WITH written AS (
  ${statement}
  RETURNING *
)
${selectCommentsFrom('written')}`;

// Parents always come before children
const THREAD_ORDER = 'ORDER BY c.depth ASC, c.order_num ASC, c.id ASC';

export const buildPostCommentsQuery = (postId: number, includeDeleted: boolean): SqlQuery => {
  const where = new WhereBuilder().add('c.post_id = ?', postId);
  if (!includeDeleted) {
    where.add('c.is_deleted = FALSE');
  }
  return { text: `${COMMENT_SELECT} ${where.toSql()} ${THREAD_ORDER}`, values: where.values };
};

export const buildCommentDescendantsQuery = (
  postId: number,
  scan: DescendantScan,
  includeDeleted: boolean
): SqlQuery => {
  const where = new WhereBuilder()
    .add('c.post_id = ?', postId)
    .add('(c.path = ? OR c.path LIKE ?)', scan.selfPath, scan.pattern);
  if (scan.excludeId !== null) {
    where.add('c.id <> ?', scan.excludeId);
  }
  if (!includeDeleted) {
    where.add('c.is_deleted = FALSE');
  }
  return { text: `${COMMENT_SELECT} ${where.toSql()} ${THREAD_ORDER}`, values: where.values };
};

export const buildCommentUpdateQuery = (commentId: number, patch: CommentPatch): SqlQuery | null => {
  const sets: string[] = [];
  const values: unknown[] = [];

  if (patch.content !== undefined) {
    values.push(patch.content);
    sets.push(`content = $${values.length}`);
  }
  if (patch.is_deleted !== undefined) {
    values.push(patch.is_deleted);
    sets.push(`is_deleted = $${values.length}`);
  }
  if (sets.length === 0) {
    return null;
  }

  values.push(commentId);
  return {
    text: withAuthor(`UPDATE comments SET ${sets.join(', ')}, updated_at = NOW() WHERE id = $${values.length}`),
    values,
  };
};

export class PgCommentRepository implements CommentRepository {
  constructor(
    private readonly db: Queryable = pool,
    private readonly inTransaction: boolean = false
  ) {}

  async transaction<T>(work: (repo: CommentRepository) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return work(this);
    }
    return withTransaction(client => work(new PgCommentRepository(client, true)));
  }

  async insert(record: NewCommentRecord): Promise<Comment> {
    const result = await this.db.query<Comment>(
      withAuthor(
        `INSERT INTO comments (post_id, parent_id, author_id, content, depth, path, order_num, password_hash)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`
      ),
      [
        record.post_id,
        record.parent_id,
        record.author_id,
        record.content,
        record.depth,
        record.path,
        record.order_num,
        record.password_hash,
      ]
    );
    return result.rows[0];
  }

  async updatePath(commentId: number, path: string): Promise<Comment> {
    const result = await this.db.query<Comment>(
      withAuthor('UPDATE comments SET path = $1, updated_at = NOW() WHERE id = $2'),
      [path, commentId]
    );
    return result.rows[0];
  }

  async findById(commentId: number): Promise<Comment | null> {
    const result = await this.db.query<Comment>(`${COMMENT_SELECT} WHERE c.id = $1`, [commentId]);
    return result.rows[0] ?? null;
  }

  async findByIds(postId: number, commentIds: number[]): Promise<Comment[]> {
    if (commentIds.length === 0) {
      return [];
    }
    const result = await this.db.query<Comment>(
      `${COMMENT_SELECT} WHERE c.post_id = $1 AND c.id = ANY($2::int[]) ORDER BY c.depth ASC`,
      [postId, commentIds]
    );
    return result.rows;
  }

  async findByPost(postId: number, includeDeleted: boolean): Promise<Comment[]> {
    const query = buildPostCommentsQuery(postId, includeDeleted);
    return (await this.db.query<Comment>(query.text, query.values)).rows;
  }

  async findDescendants(postId: number, scan: DescendantScan, includeDeleted: boolean): Promise<Comment[]> {
    const query = buildCommentDescendantsQuery(postId, scan, includeDeleted);
    return (await this.db.query<Comment>(query.text, query.values)).rows;
  }

  async countByPost(postId: number, includeDeleted: boolean): Promise<number> {
    const result = await this.db.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM comments
       WHERE post_id = $1 ${includeDeleted ? '' : 'AND is_deleted = FALSE'}`,
      [postId]
    );
    return parseInt(result.rows[0]?.count ?? '0');
  }

  async maxSiblingOrder(postId: number, parentId: number | null): Promise<number> {
    const result = await this.db.query<{ max_order: number }>(
      `SELECT COALESCE(MAX(order_num), 0) AS max_order FROM comments
       WHERE post_id = $1 AND parent_id IS NOT DISTINCT FROM $2`,
      [postId, parentId]
    );
    return Number(result.rows[0]?.max_order ?? 0);
  }

  async update(commentId: number, patch: CommentPatch): Promise<Comment | null> {
    const query = buildCommentUpdateQuery(commentId, patch);
    if (!query) {
      return this.findById(commentId);
    }
    const result = await this.db.query<Comment>(query.text, query.values);
    return result.rows[0] ?? null;
  }

  async delete(commentId: number): Promise<boolean> {
    // Replies go with it (ON DELETE CASCADE)
    const result = await this.db.query('DELETE FROM comments WHERE id = $1', [commentId]);
    return (result.rowCount ?? 0) > 0;
  }
}
