import { Comment } from '../../connections/db/models/comment.model';
import { TreeNode } from '../hierarchy';

export type CommentResponse = Omit<Comment, 'password_hash'> & {
  is_guest: boolean;
};

export type CommentTreeResponse = CommentResponse & {
  children: CommentTreeResponse[];
};

// password_hash never leaves the server
export const toCommentResponse = (comment: Comment): CommentResponse => {
  const { password_hash: _passwordHash, ...visible } = comment;
  return { ...visible, is_guest: comment.author_id === null };
};

export const toCommentTreeResponse = (node: TreeNode<Comment>): CommentTreeResponse => {
  const { children, ...comment } = node;
  return {
    ...toCommentResponse(comment),
    children: children.map(toCommentTreeResponse),
  };
};
