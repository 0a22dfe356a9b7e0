export const name = '@treedigest/exec';

export * from './ingest/args';
export * from './ingest/gitingest';
