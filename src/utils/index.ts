export * from './errors';
export * from './logger';
export * from './misc';
export * from './settings';
export * from './tokens';
export * from './truncation';
