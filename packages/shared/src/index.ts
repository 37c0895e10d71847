/**
 * Shared types for fire-kvm
 * Used by the client package and anything consuming its responses
 */

// Re-export all types
export * from './types/api.js';
export * from './types/vm.js';
export * from './types/backup.js';
export * from './types/monitoring.js';
export * from './types/endpoints.js';
export * from './types/operations.js';
