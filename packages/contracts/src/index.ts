export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/account.js";
export * from "./types/error-codes.js";

export * from "./ports/peer/sso-remote-service.js";
export * from "./ports/binding/service-binder-port.js";
