/**
 * Rate Limit System
 */

export * from './rate-limit.types';
export * from './rate-limit.manager';
