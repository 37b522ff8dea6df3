export * from './timestamp-extractor.js';
export * from './field-extractor.js';
export * from './artifact-type.js';
export * from './normalizer.js';
export * from './builder.js';
