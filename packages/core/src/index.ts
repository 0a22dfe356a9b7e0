export const name = '@treedigest/core';

export * from './config/loader';
export * from './digest/localize';
export * from './digest/lines';
export * from './digest/naming';
export * from './digest/splitter';
export * from './digest/index-writer';
export * from './digest/run';
