// Enums
export * from './enums';

// Tables
export * from './raw';
export * from './staging';
export * from './intermediate';
export * from './marts';
export * from './audit';
