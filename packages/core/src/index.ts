export * from './types';
export * from './errors';
export * from './schemas';
export * from './trace';
export * from './config';
export * from './logger';
export * from './utils/sql-guard';
export * from './utils/timing';
export * from './utils/plan';
