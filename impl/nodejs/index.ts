/**
 * Node.js Implementation
 * Loaders that need the file system
 */

export * from './definitions';
