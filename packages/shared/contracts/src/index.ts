/**
 * Shared contracts for chipstream
 *
 * Record schemas and HTTP payload shapes used by the service and its tests.
 */

export * from './common';
export * from './api';
