/**
 * Types for organization membership reconciliation
 */

export interface MembershipConfig {
  /** Immutable */
  userId: string;
  /** Immutable */
  organizationId: string;
  roleSlug?: string | null;
}

export interface MembershipState {
  id: string;
  userId: string | null;
  organizationId: string | null;
  /** Survives responses that omit it; see mergeServerValue */
  roleSlug: string | null;
  status: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}
