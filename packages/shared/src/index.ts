// Constants
export * from './constants/quality-issues';
export * from './constants/statuses';
export * from './constants/tables';

// Schemas
export * from './schemas/raw';
export * from './schemas/dataset';

// Types
export type * from './types/index';
