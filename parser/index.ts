export { createBodyPartReader } from './body/body-reader.js';
export type { BodyPartReader, BodyReaderDebugState, BodyReaderOptions } from './body/body-reader.js';

export * from './body/accumulator-errors.js';
export * from './body/string-accumulator.js';
export * from './body/body-token.js';
export * from './body/body-accumulator.js';
export * from './body/nested-form.js';
export * from './body/merge.js';
