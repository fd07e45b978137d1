// datcom core - Data Commons client, place lookups and chat provider
export * from './datacommons/index.js';
export * from './llm/index.js';
export * from './places/index.js';

export const VERSION = '0.1.0';
