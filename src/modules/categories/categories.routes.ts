import express from 'express';
import { AuthMiddleware, requireRole } from '../../middlewares/auth.middleware';
import { createCategoriesController } from './categories.controller';
import { CategoryService } from './categories.service';

export const createCategoriesRouter = (categoryService: CategoryService, auth: AuthMiddleware) => {
  const router = express.Router({ mergeParams: true });
  const controller = createCategoriesController(categoryService);
  const { authenticate } = auth;

  // Public reads; fixed segments before /:categoryId
  router.get('/roots', controller.getRootCategories);
  router.get('/tree', controller.getCategoryTree);
  router.get('/depth/:depth', controller.getCategoriesByDepth);
  router.get('/search', controller.searchCategories);
  router.get('/code/:code', controller.getCategoryByCode);
  router.get('/:categoryId', controller.getCategory);
  router.get('/:categoryId/children', controller.getChildCategories);
  router.get('/:categoryId/descendants', controller.getDescendantCategories);
  router.get('/:categoryId/breadcrumb', controller.getBreadcrumb);

  router.post('/', authenticate, controller.createCategory);
  router.put('/:categoryId', authenticate, controller.updateCategory);
  router.patch('/:categoryId/toggle-display', authenticate, controller.toggleCategoryDisplay);
  router.patch('/:categoryId/product-count', authenticate, requireRole('admin', 'staff'), controller.adjustProductCount);

  // Admin routes
  router.delete('/:categoryId', authenticate, requireRole('admin'), controller.deleteCategory);
  router.patch('/:categoryId/restore', authenticate, requireRole('admin'), controller.restoreCategory);

  return router;
};
