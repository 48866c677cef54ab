/**
 * Types for organization reconciliation
 */

/**
 * Desired organization configuration
 */
export interface OrganizationConfig {
  name: string;
  /** Verified domains; an unordered set resent in full on every write */
  domains?: string[] | null;
  allowProfilesOutsideOrganization?: boolean | null;
}

/**
 * Persisted organization state; null marks an absent value
 */
export interface OrganizationState {
  id: string;
  name: string | null;
  domains: string[] | null;
  allowProfilesOutsideOrganization: boolean | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export type OrganizationLookup = {
  id?: string;
  domain?: string;
};
