export * from './state';
export * from './TeamGraph';
export * from './chains';
export * from './ResearchGraph';
export * from './AuthoringGraph';
export * from './SupervisorGraph';
export * from './execute';
