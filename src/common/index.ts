export * from './enum';
