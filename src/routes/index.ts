/**
 * Routes exports for the gateway.
 */

export { oauth } from './oauth';
export { apiRouter as api } from './api';
export { mcpRouter as mcp } from './mcp';
export * from './errors';
export * from './pages';
