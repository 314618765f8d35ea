export * from './strategies';
export * from './dispatcher';
export * from './results';
export * from './corpus';
export * from './renderer';
export * from './recorder';
export * from './config';
export * from './bench';
