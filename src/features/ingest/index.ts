export { ingestLines, ingestFile, ingestFiles } from './ingest';
export { openSource, describeOpenError } from './helpers';
export * from './types';
