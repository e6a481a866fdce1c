// User Model - only what authentication resolves a token to

import { UserRole, UserStatus } from '../../../constants/user.constants';

export interface User {
  id: string;
  username: string;
  email: string | null;
  status: UserStatus;
  role: UserRole;
}
