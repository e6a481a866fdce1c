/**
 * Named, client-correctable failures. errorHandler turns these into the
 * ApiResponse envelope using statusCode and code.
 */
export const ERROR_CODE = {
  NOT_FOUND: 'NOT_FOUND',
  PARENT_NOT_FOUND: 'PARENT_NOT_FOUND',
  PARENT_DELETED: 'PARENT_DELETED',
  REPLY_TO_DELETED: 'REPLY_TO_DELETED',
  MAX_DEPTH_EXCEEDED: 'MAX_DEPTH_EXCEEDED',
  DUPLICATE_CODE: 'DUPLICATE_CODE',
  HAS_CHILDREN: 'HAS_CHILDREN',
  HAS_PRODUCTS: 'HAS_PRODUCTS',
  ALREADY_ACTIVE: 'ALREADY_ACTIVE',
  ALREADY_DELETED: 'ALREADY_DELETED',
  COMMENT_DELETED: 'COMMENT_DELETED',
  INVALID_DEPTH: 'INVALID_DEPTH',
  FORBIDDEN: 'FORBIDDEN',
  PASSWORD_REQUIRED: 'PASSWORD_REQUIRED',
  INVALID_PASSWORD: 'INVALID_PASSWORD',
} as const;

export type ErrorCode = typeof ERROR_CODE[keyof typeof ERROR_CODE];

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, statusCode: number = 400, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  static notFound(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(ERROR_CODE.NOT_FOUND, message, 404, details);
  }

  static parentNotFound(parentId: number): AppError {
    return new AppError(ERROR_CODE.PARENT_NOT_FOUND, 'Parent not found', 404, { parentId });
  }

  static parentDeleted(parentId: number): AppError {
    return new AppError(ERROR_CODE.PARENT_DELETED, 'Cannot create a child under a deleted parent', 400, { parentId });
  }

  static replyToDeleted(parentId: number): AppError {
    return new AppError(ERROR_CODE.REPLY_TO_DELETED, 'Cannot reply to a deleted comment', 400, { parentId });
  }

  static maxDepthExceeded(depth: number, maxDepth: number): AppError {
    return new AppError(
      ERROR_CODE.MAX_DEPTH_EXCEEDED,
      `Maximum depth exceeded (depth ${depth}, max ${maxDepth})`,
      400,
      { depth, maxDepth }
    );
  }

  static duplicateCode(code: string): AppError {
    return new AppError(ERROR_CODE.DUPLICATE_CODE, `Category code already in use: ${code}`, 409, { code });
  }

  static hasChildren(childCount: number): AppError {
    return new AppError(
      ERROR_CODE.HAS_CHILDREN,
      'Cannot delete a category that has child categories; delete the children first',
      400,
      { childCount }
    );
  }

  static hasProducts(productCount: number): AppError {
    return new AppError(
      ERROR_CODE.HAS_PRODUCTS,
      `Cannot delete a category that still has products (${productCount})`,
      400,
      { productCount }
    );
  }

  static alreadyActive(): AppError {
    return new AppError(ERROR_CODE.ALREADY_ACTIVE, 'Already active', 400);
  }

  static alreadyDeleted(): AppError {
    return new AppError(ERROR_CODE.ALREADY_DELETED, 'Already deleted', 400);
  }

  static commentDeleted(): AppError {
    return new AppError(ERROR_CODE.COMMENT_DELETED, 'A deleted comment cannot be edited', 400);
  }

  static invalidDepth(depth: number, minDepth: number, maxDepth: number): AppError {
    return new AppError(
      ERROR_CODE.INVALID_DEPTH,
      `Depth must be between ${minDepth} and ${maxDepth}`,
      400,
      { depth }
    );
  }

  static forbidden(message: string = 'Access denied'): AppError {
    return new AppError(ERROR_CODE.FORBIDDEN, message, 403);
  }

  static passwordRequired(): AppError {
    return new AppError(ERROR_CODE.PASSWORD_REQUIRED, 'Password is required for guest comments', 400);
  }

  static invalidPassword(): AppError {
    return new AppError(ERROR_CODE.INVALID_PASSWORD, 'Password does not match', 403);
  }
}
