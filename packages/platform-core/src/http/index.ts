/**
 * HTTP Module - Index
 */

export * from './response-helpers';
