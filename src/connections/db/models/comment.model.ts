// Comment Model - one materialized-path tree per post

export interface Comment {
  id: number;
  post_id: number;
  parent_id: number | null; // NULL = top-level comment
  author_id: string | null; // NULL = guest
  content: string;
  depth: number; // 0..3
  path: string; // '100/101/102'
  order_num: number; // position among siblings
  is_deleted: boolean; // Soft delete; content replaced by a placeholder
  password_hash: string | null; // guest comments only
  created_at: Date;
  updated_at: Date;
  author_username?: string | null;
}

export interface CreateCommentInput {
  content: string;
  parent_id?: number | null;
  password?: string;
}

export interface UpdateCommentInput {
  content: string;
  password?: string;
}

export interface NewCommentRecord {
  post_id: number;
  parent_id: number | null;
  author_id: string | null;
  content: string;
  depth: number;
  path: string;
  order_num: number;
  password_hash: string | null;
}

export interface CommentPatch {
  content?: string;
  is_deleted?: boolean;
}
