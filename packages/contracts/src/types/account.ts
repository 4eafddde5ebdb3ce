/**
 * One authenticated identity as reported by the remote peer. Instances are
 * never mutated; an update always produces a new record.
 */
export interface Account {
  /** Peer-assigned identifier. Empty until the peer has stored the account. */
  readonly id: string;
  readonly displayName: string;
  readonly email: string;
  readonly profileImageUrl?: string;
  /** Opaque session token. Empty until authenticated. */
  readonly sessionToken: string;
  readonly isActive: boolean;
}

/**
 * Shape sent to the peer for login and account switching. Only one of
 * `email` or `displayName` has to be present.
 */
export interface AccountDescriptor {
  readonly id?: string;
  readonly displayName?: string;
  readonly email?: string;
  readonly profileImageUrl?: string;
  readonly sessionToken?: string;
  readonly isActive?: boolean;
}
