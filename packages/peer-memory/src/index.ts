export { InMemorySsoService } from "./memory-sso-service.js";
export type { InMemorySsoServiceOptions } from "./memory-sso-service.js";

export { InMemoryServiceBinder } from "./memory-service-binder.js";
export type { HandshakeMode, RegisterServiceOptions } from "./memory-service-binder.js";
