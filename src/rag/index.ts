export * from './corpus';
export * from './format';
export * from './graph';
