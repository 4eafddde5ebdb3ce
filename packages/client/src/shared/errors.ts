import { SSO_ERROR_CODES, type DomainError, type InfraError } from "@sso-bridge/contracts";

export const CONNECT_FAILED_MESSAGE = "Could not connect to SSO Service.";

export const CONNECT_FAILED_INSTALL_HINT =
  "Could not connect to SSO Service. Please ensure the service is installed.";

export const CHANNEL_LOST_MESSAGE = "Service not connected.";

export const createConnectionUnavailableError = (
  message: string = CONNECT_FAILED_MESSAGE,
): InfraError => ({
  code: SSO_ERROR_CODES.connectionUnavailable,
  message,
  retryable: true,
});

export const createChannelLostError = (cause?: string): InfraError => ({
  code: SSO_ERROR_CODES.channelLost,
  message: CHANNEL_LOST_MESSAGE,
  details: cause === undefined ? undefined : { cause },
  retryable: true,
});

export const createRemoteCommunicationError = (message: string): InfraError => ({
  code: SSO_ERROR_CODES.remoteCommunicationFailure,
  message,
  retryable: true,
});

/**
 * The peer answered and refused. Its message is passed through untouched.
 */
export const createRemoteRejectionError = (message: string): DomainError => ({
  code: SSO_ERROR_CODES.remoteRejection,
  message,
});

export const createValidationError = (issues: string): DomainError => ({
  code: SSO_ERROR_CODES.validationFailed,
  message: "The provided account failed validation.",
  details: {
    issues,
  },
});
