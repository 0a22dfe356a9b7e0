export const name = '@treedigest/shared';

export * from './errors';
export * from './logger';
export * from './types/events';
export * from './types/ingest';
export * from './config/schema';
export * from './glob/match';
export * from './fs/path';
export * from './fs/io';
