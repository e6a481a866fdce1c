import bcrypt from 'bcryptjs';
import crypto from 'crypto';
import { authConfig } from '../../connections/config/app.config';
import {
  Comment,
  CreateCommentInput,
  UpdateCommentInput,
} from '../../connections/db/models/comment.model';
import { Actor } from '../../types/request.types';
import { AppError } from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import {
  COMMENT_PATH_STYLE,
  CommentDeleteMode,
  DELETED_COMMENT_CONTENT,
  TreeAccessors,
  TreeNode,
  assertCanAttach,
  assertRestorable,
  buildForest,
  collectAncestors,
  createWithMaterializedPath,
  descendantScan,
  nextSiblingOrder,
  pruneForest,
  resolveCommentDeleteMode,
} from '../hierarchy';
import { CommentRepository } from './comments.repository';

export const commentAccessors: TreeAccessors<Comment> = {
  id: comment => comment.id,
  parentId: comment => comment.parent_id,
};

export interface CommentServiceOptions {
  bcryptRounds: number;
}

export interface CreatedComment {
  comment: Comment;
  /** Only set when a guest did not choose a password; shown once */
  generatedPassword: string | null;
}

export interface CommentList {
  comments: Comment[];
  total: number;
}

export interface DeletedComment {
  id: number;
  mode: CommentDeleteMode;
  comment: Comment | null;
}

export const generateGuestPassword = (): string => crypto.randomBytes(6).toString('base64url');

export class CommentService {
  private readonly options: CommentServiceOptions;

  constructor(
    private readonly repo: CommentRepository,
    options: Partial<CommentServiceOptions> = {}
  ) {
    this.options = { bcryptRounds: authConfig.bcryptRounds, ...options };
  }

  /**
   * Top-level comment or reply. Members are the author; guests are
   * identified by a password instead.
   */
  async create(postId: number, input: CreateCommentInput, actor: Actor | null): Promise<CreatedComment> {
    let passwordHash: string | null = null;
    let generatedPassword: string | null = null;
    if (!actor) {
      const password = input.password ?? generateGuestPassword();
      generatedPassword = input.password ? null : password;
      passwordHash = await bcrypt.hash(password, this.options.bcryptRounds);
    }

    const parentId = input.parent_id ?? null;
    const comment = await this.repo.transaction(async tx => {
      const found = parentId === null ? null : await tx.findById(parentId);
      // A parent under another post is as good as missing
      const parent = found && found.post_id === postId ? found : null;
      assertCanAttach(
        COMMENT_PATH_STYLE,
        parentId,
        parent && { depth: parent.depth, path: parent.path, deleted: parent.is_deleted }
      );

      const orderNum = await nextSiblingOrder(tx, postId, parentId);

      return createWithMaterializedPath(COMMENT_PATH_STYLE, parent?.path ?? null, {
        insert: (path, depth) =>
          tx.insert({
            post_id: postId,
            parent_id: parentId,
            author_id: actor?.id ?? null,
            content: input.content,
            depth,
            path,
            order_num: orderNum,
            password_hash: passwordHash,
          }),
        idOf: row => row.id,
        patchPath: (row, path) => tx.updatePath(row.id, path),
      });
    });

    logger.info('Comment created', {
      postId,
      commentId: comment.id,
      parentId,
      depth: comment.depth,
      guest: actor === null,
    });
    return { comment, generatedPassword };
  }

  async get(commentId: number): Promise<Comment> {
    const comment = await this.repo.findById(commentId);
    if (!comment) {
      throw AppError.notFound('Comment not found', { commentId });
    }
    return comment;
  }

  async listFlat(postId: number, includeDeleted: boolean = false): Promise<CommentList> {
    const [comments, total] = await Promise.all([
      this.repo.findByPost(postId, includeDeleted),
      this.repo.countByPost(postId, false),
    ]);
    return { comments, total };
  }

  /**
   * Threaded view. Deleted comments stay as placeholders while they still
   * have visible replies; with includeDeleted everything is kept.
   */
  async getTree(postId: number, includeDeleted: boolean = false): Promise<TreeNode<Comment>[]> {
    const rows = await this.repo.findByPost(postId, true);
    const forest = buildForest(rows, commentAccessors);
    return includeDeleted ? forest : pruneForest(forest, comment => !comment.is_deleted);
  }

  count(postId: number, includeDeleted: boolean = false): Promise<number> {
    return this.repo.countByPost(postId, includeDeleted);
  }

  async getDescendants(commentId: number, includeSelf: boolean = false): Promise<Comment[]> {
    const comment = await this.get(commentId);
    const scan = descendantScan(COMMENT_PATH_STYLE, comment, comment.id, includeSelf);
    return this.repo.findDescendants(comment.post_id, scan, false);
  }

  async getAncestors(commentId: number, includeSelf: boolean = false): Promise<Comment[]> {
    const comment = await this.get(commentId);
    return collectAncestors(COMMENT_PATH_STYLE, comment, includeSelf, ids =>
      this.repo.findByIds(comment.post_id, ids)
    );
  }

  async update(commentId: number, input: UpdateCommentInput, actor: Actor | null): Promise<Comment> {
    const comment = await this.get(commentId);
    if (comment.is_deleted) {
      throw AppError.commentDeleted();
    }
    await this.assertCanModify(comment, actor, input.password);

    const updated = await this.repo.update(commentId, { content: input.content });
    if (!updated) {
      throw AppError.notFound('Comment not found', { commentId });
    }

    logger.info('Comment updated', { commentId });
    return updated;
  }

  /**
   * Soft delete unless an admin asks for a hard one. Hard delete takes the
   * replies with it.
   */
  async delete(
    commentId: number,
    actor: Actor | null,
    options: { hardDelete?: boolean; password?: string } = {}
  ): Promise<DeletedComment> {
    const comment = await this.get(commentId);
    await this.assertCanModify(comment, actor, options.password);

    const mode = resolveCommentDeleteMode(options.hardDelete ?? false, actor?.isAdmin ?? false);
    if (mode === 'hard') {
      await this.repo.delete(commentId);
      auditLog('comment.hard_delete', { commentId, postId: comment.post_id, path: comment.path, actorId: actor?.id });
      return { id: commentId, mode, comment: null };
    }

    if (options.hardDelete) {
      logger.warn('Hard delete requested without admin role, soft deleting instead', { commentId });
    }
    const softDeleted = await this.repo.update(commentId, {
      content: DELETED_COMMENT_CONTENT,
      is_deleted: true,
    });
    logger.info('Comment soft deleted', { commentId });
    return { id: commentId, mode, comment: softDeleted };
  }

  /**
   * Clears the flag only; the original text is gone
   */
  async restore(commentId: number): Promise<Comment> {
    const comment = await this.get(commentId);
    assertRestorable(comment.is_deleted);

    const restored = await this.repo.update(commentId, { is_deleted: false });
    if (!restored) {
      throw AppError.notFound('Comment not found', { commentId });
    }

    auditLog('comment.restore', { commentId, postId: comment.post_id });
    return restored;
  }

  private async assertCanModify(comment: Comment, actor: Actor | null, password?: string): Promise<void> {
    if (actor?.isAdmin) {
      return;
    }

    if (comment.author_id !== null) {
      if (actor?.id === comment.author_id) {
        return;
      }
      throw AppError.forbidden('Only the author can modify this comment');
    }

    if (!password) {
      throw AppError.passwordRequired();
    }
    const matches = comment.password_hash !== null && (await bcrypt.compare(password, comment.password_hash));
    if (!matches) {
      throw AppError.invalidPassword();
    }
  }
}
