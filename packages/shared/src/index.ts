export const name = '@projpick/shared';

export * from './errors';
export * from './logger';
export * from './fs/path';
export * from './config/schema';
export * from './config/loader';
