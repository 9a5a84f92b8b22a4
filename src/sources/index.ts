export type { DirectorySource, TokenDetails, UsageSource } from './types.js';
export type { JsonClient, JsonClientOptions } from './http-client.js';
export { createJsonClient } from './http-client.js';
export type { UsageSourceOptions } from './usage-source.js';
export { createUsageSource, tokenId } from './usage-source.js';
export type { DirectorySourceOptions } from './directory-source.js';
export { createDirectorySource } from './directory-source.js';
