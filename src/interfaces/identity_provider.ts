/**
 * IdentityProvider: the platform's sign-in layer, outside trade-link.
 *
 * A ticket is bound to the signed-in identity and becomes invalid once
 * canceled or replaced. SessionManager is the only caller of requestTicket()
 * and cancelTicket(), and keeps at most one ticket alive.
 */

export interface IdentityTicket {
  /** Provider-side handle used to cancel the ticket. */
  handle: number | string;
  bytes: Uint8Array;
}

export interface IdentityProvider {
  /** False when the player is not signed in or the platform is unreachable. */
  isAvailable(): boolean;

  displayName(): string;

  /** Stable id of the signed-in identity. */
  identityHandle(): string;

  /** Returns null when the provider refuses to issue a ticket. */
  requestTicket(): IdentityTicket | null;

  cancelTicket(ticket: IdentityTicket): void;
}
