export const name = '@configbench/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './fs/io';
export * from './string-utils';
export * from './config/schema';
export * from './bench';
