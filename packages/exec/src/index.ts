export * from './command/types';
export * from './command/parser';
export * from './runner/types';
export * from './runner/runner';
