export * from './corpus/index.js';
export * from './retrieval/index.js';
export * from './verification/index.js';
export * from './output/index.js';
export * from './pipeline/index.js';
