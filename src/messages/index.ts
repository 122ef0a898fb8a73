export * from './reducer';
export * from './content';
