/**
 * Platform Core - Shared Utilities for chipstream services
 *
 * - Structured logging with correlation tracking
 * - Error taxonomy and express error middleware
 * - Response helpers
 * - Request validation
 * - Environment configuration
 * - Graceful shutdown
 */

export * from './config';
export * from './error-handling';
export * from './http';
export * from './logging';
export * from './middleware';
export * from './lifecycle';

