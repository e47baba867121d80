/**
 * Logging Module - Index
 *
 * Exports all logging functionality for platform-core
 */

export * from './types';
export * from './logger';
export * from './formatting';
export * from './middleware';
export * from './correlation';
export * from './error-serializer';

