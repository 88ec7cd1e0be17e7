export * from './output/formatter.js';
export { withSinew, withStoreOptions, parseContext, readText, type StoreOptions } from './setup.js';
