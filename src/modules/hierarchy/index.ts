export * from './hierarchy.types';
export * from './materialized-path';
export * from './depth-guard';
export * from './ancestry';
export * from './tree-builder';
export * from './ordering';
export * from './soft-delete';
