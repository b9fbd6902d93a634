/**
 * Gateway module public API.
 * Re-exports the server factory and route helpers.
 */

export { createGatewayServer } from './server.js';
export type { GatewayServer, GatewayServerOptions } from './server.js';
export { parseChatRequest } from './api/chat.js';
