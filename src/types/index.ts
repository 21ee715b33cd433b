/**
 * Type definitions for the tubegrab service
 */

export * from './config';
export * from './job';
export * from './media';
