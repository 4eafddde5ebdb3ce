export const SSO_ERROR_CODES = {
  connectionUnavailable: "sso.connection_unavailable",
  channelLost: "sso.channel_lost",
  remoteCommunicationFailure: "sso.remote_communication_failure",
  remoteRejection: "sso.remote_rejection",
  validationFailed: "sso.validation_failed",
} as const;

export type SsoErrorCode = (typeof SSO_ERROR_CODES)[keyof typeof SSO_ERROR_CODES];

export type RemoteFailureKind = "communication" | "rejection";

/**
 * Thrown by transports and peers when a remote call does not complete.
 * `communication` covers transport faults; `rejection` is the peer's own
 * application-level refusal, with a peer-supplied message.
 */
export class RemoteServiceError extends Error {
  constructor(
    readonly kind: RemoteFailureKind,
    message: string,
  ) {
    super(message);
    this.name = "RemoteServiceError";
  }
}

export const isRemoteServiceError = (value: unknown): value is RemoteServiceError =>
  value instanceof RemoteServiceError;
