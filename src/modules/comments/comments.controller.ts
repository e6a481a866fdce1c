import { NextFunction, Response } from 'express';
import { toActor } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { CommentService } from './comments.service';
import { toCommentResponse, toCommentTreeResponse } from './comments.serializer';
import {
  commentParamsSchema,
  createCommentSchema,
  deleteQuerySchema,
  includeSelfQuerySchema,
  listQuerySchema,
  postParamsSchema,
  updateCommentSchema,
} from './comments.validation';

export const createCommentsController = (commentService: CommentService) => {
  // include_deleted is an admin view; everyone else gets the public one
  const includeDeletedFor = (req: AuthRequest): boolean => {
    const { include_deleted } = listQuerySchema.parse(req.query);
    return (include_deleted ?? false) && (toActor(req.user)?.isAdmin ?? false);
  };

  const createComment = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { postId } = postParamsSchema.parse(req.params);
      const validated = createCommentSchema.parse(req.body);

      const { comment, generatedPassword } = await commentService.create(postId, validated, toActor(req.user));

      return ResponseHandler.created(
        res,
        {
          ...toCommentResponse(comment),
          ...(generatedPassword ? { generated_password: generatedPassword } : {}),
        },
        comment.parent_id === null ? 'Comment created' : 'Reply created'
      );
    } catch (error) {
      next(error);
    }
  };

  const getPostComments = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { postId } = postParamsSchema.parse(req.params);

      const { comments, total } = await commentService.listFlat(postId, includeDeletedFor(req));

      return ResponseHandler.success(res, comments.map(toCommentResponse), 'Comments', 200, { total });
    } catch (error) {
      next(error);
    }
  };

  const getPostCommentTree = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { postId } = postParamsSchema.parse(req.params);

      const [forest, total] = await Promise.all([
        commentService.getTree(postId, includeDeletedFor(req)),
        commentService.count(postId),
      ]);

      return ResponseHandler.success(res, forest.map(toCommentTreeResponse), 'Comment tree', 200, { total });
    } catch (error) {
      next(error);
    }
  };

  const getComment = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { commentId } = commentParamsSchema.parse(req.params);

      const comment = await commentService.get(commentId);

      return ResponseHandler.success(res, toCommentResponse(comment));
    } catch (error) {
      next(error);
    }
  };

  const getCommentDescendants = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { commentId } = commentParamsSchema.parse(req.params);
      const { include_self } = includeSelfQuerySchema.parse(req.query);

      const comments = await commentService.getDescendants(commentId, include_self ?? false);

      return ResponseHandler.success(res, comments.map(toCommentResponse), 'Replies', 200, {
        count: comments.length,
      });
    } catch (error) {
      next(error);
    }
  };

  const getCommentAncestors = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { commentId } = commentParamsSchema.parse(req.params);
      const { include_self } = includeSelfQuerySchema.parse(req.query);

      const comments = await commentService.getAncestors(commentId, include_self ?? false);

      return ResponseHandler.success(res, comments.map(toCommentResponse), 'Thread context');
    } catch (error) {
      next(error);
    }
  };

  const updateComment = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { commentId } = commentParamsSchema.parse(req.params);
      const validated = updateCommentSchema.parse(req.body);

      const comment = await commentService.update(commentId, validated, toActor(req.user));

      return ResponseHandler.success(res, toCommentResponse(comment), 'Comment updated');
    } catch (error) {
      next(error);
    }
  };

  const deleteComment = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { commentId } = commentParamsSchema.parse(req.params);
      const query = deleteQuerySchema.parse(req.query);

      const result = await commentService.delete(commentId, toActor(req.user), {
        hardDelete: query.hard_delete,
        password: query.password,
      });

      return ResponseHandler.success(
        res,
        {
          id: result.id,
          hard_deleted: result.mode === 'hard',
          comment: result.comment && toCommentResponse(result.comment),
        },
        result.mode === 'hard' ? 'Comment permanently deleted' : 'Comment deleted'
      );
    } catch (error) {
      next(error);
    }
  };

  const restoreComment = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { commentId } = commentParamsSchema.parse(req.params);

      const comment = await commentService.restore(commentId);

      return ResponseHandler.success(res, toCommentResponse(comment), 'Comment restored');
    } catch (error) {
      next(error);
    }
  };

  return {
    createComment,
    getPostComments,
    getPostCommentTree,
    getComment,
    getCommentDescendants,
    getCommentAncestors,
    updateComment,
    deleteComment,
    restoreComment,
  };
};
