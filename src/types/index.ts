export * from './graph';
export * from './tools';
export * from './logger';
export * from './run';
