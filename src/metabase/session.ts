/**
 * A Metabase session is an explicit value handed to every client call.
 * Nothing caches it globally; renewing one means logging in again and
 * threading the new value forward.
 */
export interface Session {
  readonly id: string;
  readonly issuedAt: Date;
  readonly expiresAt: Date;
}

export function createSession(id: string, ttlMs: number, now: Date = new Date()): Session {
  return Object.freeze({
    id,
    issuedAt: now,
    expiresAt: new Date(now.getTime() + ttlMs),
  });
}

/**
 * A session counts as expired slightly before its nominal expiry so a long
 * query started just before the deadline does not run on a dead token.
 */
export function isSessionExpired(session: Session, now: Date = new Date(), skewMs = 60_000): boolean {
  return now.getTime() + skewMs >= session.expiresAt.getTime();
}
