/**
 * Types for SSO connection lookups
 */

export interface ConnectionState {
  id: string;
  organizationId: string;
  connectionType: string;
  name: string;
  state: string;
  status: string | null;
  createdAt: string;
  updatedAt: string;
}

export type ConnectionLookup = {
  id?: string;
  /** Required together with connectionType */
  organizationId?: string;
  connectionType?: string;
};
