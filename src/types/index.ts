export type * from './ioc.js';
export type * from './config.js';
