/**
 * API types for the WorkOS client
 *
 * Entity types mirror the JSON the API returns (snake_case). Request types are
 * camelCase and are mapped onto the wire format by the entity clients.
 */

import type { ApiLogger } from './logger.js';

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods supported by the API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Query string values accepted by list endpoints
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Cursor pagination parameters for list endpoints
 */
export interface PaginationParams {
  /** Number of items to return */
  limit?: number;
  /** Cursor for fetching items before this ID */
  before?: string;
  /** Cursor for fetching items after this ID */
  after?: string;
  /** Sort order */
  order?: 'asc' | 'desc';
}

/**
 * Cursor metadata returned alongside every list response
 */
export interface ListMetadata {
  before?: string | null;
  after?: string | null;
}

/**
 * Envelope shared by all list endpoints
 */
export interface ListResponse<T> {
  data: T[];
  list_metadata: ListMetadata;
}

/**
 * Per-request options
 */
export interface RequestOptions {
  /** Cancels the request and any pending retry wait */
  signal?: AbortSignal;
}

// =============================================================================
// Organizations
// =============================================================================

export interface OrganizationDomain {
  id: string;
  object?: string;
  domain: string;
  state?: string;
  organization_id?: string;
  verification_type?: string;
}

export interface Organization {
  id: string;
  object?: string;
  name: string;
  allow_profiles_outside_organization?: boolean;
  domains?: OrganizationDomain[] | null;
  created_at: string;
  updated_at: string;
}

/**
 * Domain entry sent on organization writes
 */
export interface DomainData {
  domain: string;
  state?: 'verified' | 'pending';
}

export interface CreateOrganizationRequest {
  name: string;
  domainData?: DomainData[];
  allowProfilesOutsideOrganization?: boolean;
}

export interface UpdateOrganizationRequest {
  name?: string;
  domainData?: DomainData[];
  allowProfilesOutsideOrganization?: boolean;
}

// =============================================================================
// SSO Connections
// =============================================================================

/**
 * Connection types offered by the SSO product
 */
export const CONNECTION_TYPES = [
  'ADFSSAML',
  'AdpOidc',
  'Auth0SAML',
  'AzureSAML',
  'CasSAML',
  'ClassLinkSAML',
  'CloudflareSAML',
  'CyberArkSAML',
  'DuoSAML',
  'GenericOIDC',
  'GenericSAML',
  'GitHubOAuth',
  'GoogleOAuth',
  'GoogleSAML',
  'JumpCloudSAML',
  'KeycloakSAML',
  'LastPassSAML',
  'LoginGovOidc',
  'MagicLink',
  'MicrosoftOAuth',
  'MiniOrangeSAML',
  'NetIqSAML',
  'OktaSAML',
  'OneLoginSAML',
  'OracleSAML',
  'PingFederateSAML',
  'PingOneSAML',
  'RipplingSAML',
  'SalesforceSAML',
  'ShibbolethGenericSAML',
  'ShibbolethSAML',
  'SimpleSamlPhpSAML',
  'VMwareSAML',
] as const;

export type ConnectionType = (typeof CONNECTION_TYPES)[number];

export interface Connection {
  id: string;
  object?: string;
  organization_id: string;
  connection_type: string;
  name: string;
  state: string;
  status?: string;
  created_at: string;
  updated_at: string;
}

export interface ListConnectionsOptions extends PaginationParams {
  organizationId?: string;
  connectionType?: string;
}

// =============================================================================
// Directory Sync
// =============================================================================

export interface Directory {
  id: string;
  object?: string;
  organization_id: string;
  name: string;
  type: string;
  state: string;
  bearer_token?: string;
  endpoint?: string;
  created_at: string;
  updated_at: string;
}

export interface DirectoryUser {
  id: string;
  object?: string;
  directory_id: string;
  organization_id: string;
  idp_id: string;
  first_name?: string | null;
  last_name?: string | null;
  email?: string | null;
  username?: string | null;
  state: string;
  custom_attributes?: Record<string, unknown>;
  raw_attributes?: Record<string, unknown>;
  created_at: string;
  updated_at: string;
}

export interface DirectoryGroup {
  id: string;
  object?: string;
  directory_id: string;
  organization_id: string;
  idp_id: string;
  name: string;
  created_at: string;
  updated_at: string;
}

export interface ListDirectoriesOptions extends PaginationParams {
  organizationId?: string;
}

export interface ListDirectoryUsersOptions extends PaginationParams {
  directoryId?: string;
  groupId?: string;
}

export interface ListDirectoryGroupsOptions extends PaginationParams {
  directoryId?: string;
  userId?: string;
}

// =============================================================================
// Webhooks
// =============================================================================

export interface Webhook {
  id: string;
  object?: string;
  url: string;
  /** Never returned by reads */
  secret?: string;
  enabled: boolean;
  events: string[] | null;
  created_at: string;
  updated_at: string;
}

export interface CreateWebhookRequest {
  url: string;
  secret: string;
  enabled: boolean;
  events: string[];
}

export interface UpdateWebhookRequest {
  url?: string;
  secret?: string;
  enabled?: boolean;
  events?: string[];
}

// =============================================================================
// User Management
// =============================================================================

export interface User {
  id: string;
  object?: string;
  email: string;
  email_verified: boolean;
  first_name?: string | null;
  last_name?: string | null;
  profile_picture_url?: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreateUserRequest {
  email: string;
  emailVerified: boolean;
  firstName?: string;
  lastName?: string;
  password?: string;
  passwordHash?: string;
  passwordHashType?: string;
}

export interface UpdateUserRequest {
  email?: string;
  /** Always sent: changing the email resets verification server-side */
  emailVerified: boolean;
  firstName?: string;
  lastName?: string;
  password?: string;
  passwordHash?: string;
  passwordHashType?: string;
}

export interface ListUsersOptions extends PaginationParams {
  email?: string;
  organizationId?: string;
}

export interface OrganizationMembership {
  id: string;
  object?: string;
  user_id: string;
  organization_id: string;
  /** Not reliably echoed back by the API */
  role_slug?: string | null;
  status: string;
  created_at: string;
  updated_at: string;
}

export interface CreateOrganizationMembershipRequest {
  userId: string;
  organizationId: string;
  roleSlug?: string;
}

export interface ListOrganizationMembershipsOptions extends PaginationParams {
  userId?: string;
  organizationId?: string;
}

// =============================================================================
// Authorization (organization roles)
// =============================================================================

export interface OrganizationRole {
  id: string;
  object?: string;
  slug: string;
  name: string;
  description?: string | null;
  type?: string;
  permissions?: string[] | null;
  created_at: string;
  updated_at: string;
}

export interface CreateOrganizationRoleRequest {
  slug: string;
  name: string;
  description?: string;
}

export interface UpdateOrganizationRoleRequest {
  name: string;
  description: string;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Client configuration
 */
export interface WorkOSClientConfig {
  /** Secret API key (required) */
  apiKey: string;
  /** Client identifier, used by AuthKit-scoped operations */
  clientId?: string;
  /** Base URL for the API (defaults to https://api.workos.com) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Retry tuning for rate-limited requests */
  retry?: RetryConfig;
  /** fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
  /** Logger used for request/response tracing */
  logger?: ApiLogger;
}

/**
 * Retry configuration for rate-limited requests
 */
export interface RetryConfig {
  /** Maximum number of retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum backoff delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Upper bound of the additive jitter, as a fraction of the delay (default: 0.25) */
  jitterFactor?: number;
}
