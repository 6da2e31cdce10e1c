/**
 * Core type definitions for multikube.
 */

export * from './core';
export * from './inventory';
export * from './providers';
