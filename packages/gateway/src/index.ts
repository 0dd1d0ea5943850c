/**
 * @hostwarden/gateway -- HTTP control surface
 */

export { GatewayServer, SECRET_HEADER } from './server.js';
export type { GatewayServerOptions } from './server.js';
