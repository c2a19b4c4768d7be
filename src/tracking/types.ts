/**
 * Usage tracking types.
 * A usage record associates a credential (by fingerprint) with a context
 * that used it. Tracking the same pair again only refreshes `lastUsedAt`.
 */

export interface UsageRecord {
  fingerprint: string;
  credentialId: string;
  contextId: string;
  contextKind: string;
  firstUsedAt: Date;
  lastUsedAt: Date;
}

// ─── Repository Interface ────────────────────────────────────────

export interface UsageRepository {
  /** Find the association for a fingerprint+context. Returns null if not found. */
  find(fingerprint: string, contextId: string): Promise<UsageRecord | null>;

  /** Store or overwrite an association. */
  save(record: UsageRecord): Promise<UsageRecord>;

  /** List every association of a fingerprint, oldest first. */
  listByFingerprint(fingerprint: string): Promise<UsageRecord[]>;
}
