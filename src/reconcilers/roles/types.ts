/**
 * Types for organization role reconciliation
 */

/**
 * Slugs of organization-scoped roles must carry this prefix
 */
export const ROLE_SLUG_PREFIX = 'org-';

/**
 * Format of the composite import identifier
 */
export const ROLE_IMPORT_FORMAT = 'organization_id/slug';

export interface RoleConfig {
  /** Immutable */
  organizationId: string;
  /** Immutable, must start with ROLE_SLUG_PREFIX */
  slug: string;
  name: string;
  /** Left unset, the current value is kept */
  description?: string;
}

export interface RoleState {
  /** Unknown until the first read after an import */
  id: string | null;
  organizationId: string;
  slug: string;
  name: string | null;
  description: string | null;
  type: string | null;
  /** Server-computed; never null */
  permissions: string[];
  createdAt: string | null;
  updatedAt: string | null;
}

export type RoleLookup = {
  organizationId?: string;
  slug?: string;
  id?: string;
};
