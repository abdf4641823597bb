/**
 * Routes Index
 * 
 * Barrel export for all API routes.
 */

export { healthRoutes } from './health.js';
export { uploadRoutes, type StorageRouteOptions } from './upload.js';
export { fileRoutes } from './files.js';
