/**
 * Types for directory sync lookups
 */

export interface DirectoryState {
  id: string;
  organizationId: string;
  type: string;
  name: string;
  state: string;
  /** Sensitive; only present while the directory awaits setup */
  bearerToken: string | null;
  endpoint: string | null;
  createdAt: string;
  updatedAt: string;
}

export type DirectoryLookup = {
  id?: string;
  organizationId?: string;
};

export interface DirectoryUserState {
  id: string;
  directoryId: string;
  organizationId: string;
  idpId: string;
  firstName: string | null;
  lastName: string | null;
  email: string | null;
  username: string | null;
  state: string;
  createdAt: string;
  updatedAt: string;
}

export type DirectoryUserLookup = {
  id?: string;
  /** Required together with email */
  directoryId?: string;
  email?: string;
};

export interface DirectoryGroupState {
  id: string;
  directoryId: string;
  organizationId: string;
  idpId: string;
  name: string;
  createdAt: string;
  updatedAt: string;
}

export type DirectoryGroupLookup = {
  id?: string;
  /** Required together with name */
  directoryId?: string;
  name?: string;
};
