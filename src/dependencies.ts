import { pool } from './connections';
import { createPgUserResolver } from './middlewares/auth.middleware';
import { PgCategoryRepository } from './modules/categories/categories.repository';
import { CategoryService } from './modules/categories/categories.service';
import { PgCommentRepository } from './modules/comments/comments.repository';
import { CommentService } from './modules/comments/comments.service';
import { AppDependencies } from './app';

/**
 * Production wiring: PostgreSQL repositories behind the services
 */
export const createDependencies = (): AppDependencies => ({
  categoryService: new CategoryService(new PgCategoryRepository(pool)),
  commentService: new CommentService(new PgCommentRepository(pool)),
  resolveUser: createPgUserResolver(pool),
  checkDatabase: async () => {
    await pool.query('SELECT 1');
  },
});
