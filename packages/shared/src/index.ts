export * from './constants';
export * from './types';
export * from './validators';
export * from './utils/sanitizeName';
export * from './utils/deterministicId';
