/**
 * Centralized configuration exports
 *
 * This file serves as the main entry point for all configuration data,
 * providing a single import location for other modules.
 */

// Re-export all configuration modules
export * from './env.js';
export * from './proxy.js';
export * from './routes.js';
export * from './security.js';
