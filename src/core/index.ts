export * from './logger/index.js';
export * from './env.js';

// Feature modules with namespace disambiguation
export * as ClientEvents from './client-events/index.js';
export * as WebSearch from './web-search/index.js';
