export { handleApiRequest } from './routes.js';
export type { ApiContext, ApiRequest, ApiResponse } from './routes.js';
export { startServer } from './http.js';
export type { RunningServer, ServerOptions } from './http.js';
export { attachEventStream } from './ws.js';
export type { EventStream } from './ws.js';
