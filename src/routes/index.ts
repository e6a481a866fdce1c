import express from 'express';
import { AuthMiddleware } from '../middlewares/auth.middleware';
import { createCategoriesRouter } from '../modules/categories/categories.routes';
import { CategoryService } from '../modules/categories/categories.service';
import { createCommentsRouter } from '../modules/comments/comments.routes';
import { CommentService } from '../modules/comments/comments.service';

export interface RouteServices {
  categoryService: CategoryService;
  commentService: CommentService;
}

export const createRoutes = (services: RouteServices, auth: AuthMiddleware) => {
  const router = express.Router();

  // API Routes
  router.use('/categories/shops/:shopId', createCategoriesRouter(services.categoryService, auth));
  router.use('/comments', createCommentsRouter(services.commentService, auth));

  return router;
};
