import { MigrationInfo } from './types';

import * as migration001 from './20260105_000001_create_users_table';
import * as migration002 from './20260105_000002_create_shops_table';
import * as migration003 from './20260105_000003_create_posts_table';
import * as migration004 from './20260105_000004_create_shop_categories_table';
import * as migration005 from './20260105_000005_create_comments_table';

export const migrations: MigrationInfo[] = [
  { name: '20260105_000001_create_users_table', migration: migration001.migration },
  { name: '20260105_000002_create_shops_table', migration: migration002.migration },
  { name: '20260105_000003_create_posts_table', migration: migration003.migration },
  { name: '20260105_000004_create_shop_categories_table', migration: migration004.migration },
  { name: '20260105_000005_create_comments_table', migration: migration005.migration },
];
