export { FireApiClient } from './FireApiClient.js';
export { AsyncFireApiClient } from './AsyncFireApiClient.js';
export { groupOperations } from './groups.js';
export type { OperationGroups } from './groups.js';
export type { FireClientOptions } from './types.js';
