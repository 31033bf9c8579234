export { buildStaticServer, listenStaticServer } from './static-server.js';
export type { StaticServerContext } from './static-server.js';
