/**
 * Types for user reconciliation
 */

export interface UserConfig {
  email: string;
  emailVerified?: boolean;
  firstName?: string | null;
  lastName?: string | null;
  /** Write-only */
  password?: string | null;
  /** Write-only */
  passwordHash?: string | null;
  /** Algorithm of passwordHash, e.g. "bcrypt" */
  passwordHashType?: string | null;
}

export interface UserState {
  id: string;
  email: string | null;
  emailVerified: boolean | null;
  firstName: string | null;
  lastName: string | null;
  /** Retained from configuration; never read back */
  password: string | null;
  /** Retained from configuration; never read back */
  passwordHash: string | null;
  passwordHashType: string | null;
  profilePictureUrl: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export type UserLookup = {
  id?: string;
  email?: string;
};
