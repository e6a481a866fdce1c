import { NextFunction, Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { CategoryService } from './categories.service';
import { toCategoryResponse, toCategoryTreeResponse } from './categories.serializer';
import {
  categoryParamsSchema,
  codeParamsSchema,
  createCategorySchema,
  deleteQuerySchema,
  depthParamsSchema,
  descendantsQuerySchema,
  displayQuerySchema,
  productCountSchema,
  searchQuerySchema,
  shopParamsSchema,
  treeQuerySchema,
  updateCategorySchema,
} from './categories.validation';

export type CategoriesController = ReturnType<typeof createCategoriesController>;

export const createCategoriesController = (categoryService: CategoryService) => {
  const createCategory = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId } = shopParamsSchema.parse(req.params);
      const validated = createCategorySchema.parse(req.body);

      const category = await categoryService.create(shopId, validated);

      return ResponseHandler.created(res, toCategoryResponse(category), 'Category created');
    } catch (error) {
      next(error);
    }
  };

  const getRootCategories = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId } = shopParamsSchema.parse(req.params);
      const { use_display } = displayQuerySchema.parse(req.query);

      const categories = await categoryService.getRoots(shopId, use_display ?? true);

      return ResponseHandler.success(res, categories.map(toCategoryResponse), 'Root categories', 200, {
        count: categories.length,
      });
    } catch (error) {
      next(error);
    }
  };

  const getCategoryTree = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId } = shopParamsSchema.parse(req.params);
      const query = treeQuerySchema.parse(req.query);

      const forest = await categoryService.getTree(shopId, {
        parentId: query.parent_id,
        useDisplay: query.use_display ?? true,
      });

      return ResponseHandler.success(res, forest.map(toCategoryTreeResponse), 'Category tree');
    } catch (error) {
      next(error);
    }
  };

  const getCategoriesByDepth = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, depth } = depthParamsSchema.parse(req.params);
      const { use_display } = displayQuerySchema.parse(req.query);

      const categories = await categoryService.getByDepth(shopId, depth, use_display ?? true);

      return ResponseHandler.success(res, categories.map(toCategoryResponse), `Categories at depth ${depth}`, 200, {
        count: categories.length,
      });
    } catch (error) {
      next(error);
    }
  };

  const searchCategories = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId } = shopParamsSchema.parse(req.params);
      const query = searchQuerySchema.parse(req.query);

      const categories = await categoryService.search(shopId, query.keyword, query.depth, query.use_display ?? true);

      return ResponseHandler.success(res, categories.map(toCategoryResponse), 'Search results', 200, {
        count: categories.length,
        keyword: query.keyword,
      });
    } catch (error) {
      next(error);
    }
  };

  const getCategoryByCode = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, code } = codeParamsSchema.parse(req.params);

      const category = await categoryService.getByCode(shopId, code);

      return ResponseHandler.success(res, toCategoryResponse(category));
    } catch (error) {
      next(error);
    }
  };

  const getCategory = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, categoryId } = categoryParamsSchema.parse(req.params);

      const category = await categoryService.get(shopId, categoryId);

      return ResponseHandler.success(res, toCategoryResponse(category));
    } catch (error) {
      next(error);
    }
  };

  const getChildCategories = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, categoryId } = categoryParamsSchema.parse(req.params);
      const { use_display } = displayQuerySchema.parse(req.query);

      const categories = await categoryService.getChildren(shopId, categoryId, use_display ?? true);

      return ResponseHandler.success(res, categories.map(toCategoryResponse), 'Child categories', 200, {
        count: categories.length,
      });
    } catch (error) {
      next(error);
    }
  };

  const getDescendantCategories = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, categoryId } = categoryParamsSchema.parse(req.params);
      const query = descendantsQuerySchema.parse(req.query);

      const categories = await categoryService.getDescendants(
        shopId,
        categoryId,
        query.include_self ?? false,
        query.use_display ?? false
      );

      return ResponseHandler.success(res, categories.map(toCategoryResponse), 'Descendant categories', 200, {
        count: categories.length,
      });
    } catch (error) {
      next(error);
    }
  };

  const getBreadcrumb = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, categoryId } = categoryParamsSchema.parse(req.params);

      const ancestors = await categoryService.getBreadcrumb(shopId, categoryId);

      return ResponseHandler.success(res, ancestors.map(toCategoryResponse), 'Breadcrumb');
    } catch (error) {
      next(error);
    }
  };

  const updateCategory = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, categoryId } = categoryParamsSchema.parse(req.params);
      const validated = updateCategorySchema.parse(req.body);

      const category = await categoryService.update(shopId, categoryId, validated);

      return ResponseHandler.success(res, toCategoryResponse(category), 'Category updated');
    } catch (error) {
      next(error);
    }
  };

  const deleteCategory = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, categoryId } = categoryParamsSchema.parse(req.params);
      const { hard_delete } = deleteQuerySchema.parse(req.query);
      const hardDelete = hard_delete ?? false;

      const category = await categoryService.delete(shopId, categoryId, hardDelete);

      return ResponseHandler.success(
        res,
        toCategoryResponse(category),
        hardDelete ? 'Category permanently deleted' : 'Category deleted'
      );
    } catch (error) {
      next(error);
    }
  };

  const restoreCategory = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, categoryId } = categoryParamsSchema.parse(req.params);

      const category = await categoryService.restore(shopId, categoryId);

      return ResponseHandler.success(res, toCategoryResponse(category), 'Category restored');
    } catch (error) {
      next(error);
    }
  };

  const toggleCategoryDisplay = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, categoryId } = categoryParamsSchema.parse(req.params);

      const category = await categoryService.toggleDisplay(shopId, categoryId);

      return ResponseHandler.success(
        res,
        toCategoryResponse(category),
        category.use_display ? 'Category shown' : 'Category hidden'
      );
    } catch (error) {
      next(error);
    }
  };

  const adjustProductCount = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { shopId, categoryId } = categoryParamsSchema.parse(req.params);
      const { delta } = productCountSchema.parse(req.body);

      const category = await categoryService.adjustProductCount(shopId, categoryId, delta);

      return ResponseHandler.success(res, toCategoryResponse(category), 'Product count updated');
    } catch (error) {
      next(error);
    }
  };

  return {
    createCategory,
    getRootCategories,
    getCategoryTree,
    getCategoriesByDepth,
    searchCategories,
    getCategoryByCode,
    getCategory,
    getChildCategories,
    getDescendantCategories,
    getBreadcrumb,
    updateCategory,
    deleteCategory,
    restoreCategory,
    toggleCategoryDisplay,
    adjustProductCount,
  };
};
