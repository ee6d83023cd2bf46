export const name = '@gitree/shared';

export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './config/loader';
export * from './fs/path';
