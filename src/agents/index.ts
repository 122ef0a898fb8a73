export * from './Agent';
export * from './nodes';
export * from './supervisor';
