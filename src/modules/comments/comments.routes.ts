import express from 'express';
import { AuthMiddleware, requireRole } from '../../middlewares/auth.middleware';
import { createCommentsController } from './comments.controller';
import { CommentService } from './comments.service';

export const createCommentsRouter = (commentService: CommentService, auth: AuthMiddleware) => {
  const router = express.Router();
  const controller = createCommentsController(commentService);
  const { authenticate, optionalAuthenticate } = auth;

  // Guests may post; a token, when present, identifies the author
  router.post('/posts/:postId', optionalAuthenticate, controller.createComment);
  router.get('/posts/:postId/flat', optionalAuthenticate, controller.getPostComments);
  router.get('/posts/:postId/tree', optionalAuthenticate, controller.getPostCommentTree);

  router.get('/:commentId', controller.getComment);
  router.get('/:commentId/descendants', controller.getCommentDescendants);
  router.get('/:commentId/ancestors', controller.getCommentAncestors);

  router.put('/:commentId', optionalAuthenticate, controller.updateComment);
  router.patch('/:commentId', optionalAuthenticate, controller.updateComment);
  router.delete('/:commentId', optionalAuthenticate, controller.deleteComment);

  // Admin routes
  router.patch('/:commentId/restore', authenticate, requireRole('admin'), controller.restoreComment);

  return router;
};
