export { parseRecord } from './record-parser';
export { kelvinToFahrenheit, isFlagSet, stripLineEnding } from './helpers';
export * from './types';
