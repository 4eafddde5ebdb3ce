export { createSsoSocketServer } from "./socket-server.js";
export type { SsoSocketServer, SsoSocketServerOptions } from "./socket-server.js";

export { SocketServiceBinder, toSocketUrl } from "./socket-binder.js";
export type { SocketServiceBinderOptions } from "./socket-binder.js";

export { SocketRemoteService, CHANNEL_CLOSED_MESSAGE } from "./socket-remote-service.js";
export { MALFORMED_FAILURE_MESSAGE, SSO_METHODS } from "./protocol.js";
export type { SsoMethod } from "./protocol.js";
