/**
 * Routes Index
 */

export { default as healthRoutes } from './health';
export { createPublicRoutes } from './public';
export { createFarmRoutes } from './farms';
