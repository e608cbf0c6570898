export * from './worldState';
export * from './serialize';
