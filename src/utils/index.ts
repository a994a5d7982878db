/**
 * Utility functions for Claro
 */

export * from './types';
export * from './valueConversion';
export * from './args';
export * from './errorFormatter';
