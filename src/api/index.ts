/**
 * WorkOS API client module
 *
 * Provides:
 * - WorkOSClient with one capability-tagged sub-client per entity family
 * - Transport with 429 retry and error classification
 * - JSON logging with secret redaction
 * - Full type definitions for API entities
 */

// Main client
export { createClient, collectPages } from './client.js';

export type {
  Capability,
  ReadOnlyEntityClient,
  CrudEntityClient,
  WorkOSClient,
  OrganizationsClient,
  ConnectionsClient,
  DirectoriesClient,
  DirectoryUsersClient,
  DirectoryGroupsClient,
  WebhooksClient,
  UsersClient,
  MembershipsClient,
  RolesClient,
} from './client.js';

// Transport
export { createTransport, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, USER_AGENT } from './transport.js';
export type { Transport, SendOptions } from './transport.js';

// Retry utilities
export {
  calculateDelay,
  calculateBackoff,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
  MAX_TIMER_MS,
  RATE_LIMIT_STATUS,
} from './retry.js';

// Errors
export {
  ApiRequestError,
  ConfigurationError,
  ImportIdError,
  kindForStatus,
  defaultMessageForStatus,
  parseApiError,
  notFoundError,
  errorMessage,
  isNotFound,
  isUnauthorized,
  isForbidden,
  isBadRequest,
  isConflict,
  isRateLimited,
  isInternalServerError,
} from './errors.js';

export type { ErrorKind, FieldError } from './errors.js';

// Logger utilities
export {
  logger,
  createLogger,
  ApiLogger,
  REDACTED,
  redactPatterns,
  redactValue,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogRecord, LoggerConfig } from './logger.js';

// Types
export type {
  // Common
  HttpMethod,
  QueryParams,
  PaginationParams,
  ListMetadata,
  ListResponse,
  RequestOptions,

  // Entities
  Organization,
  OrganizationDomain,
  DomainData,
  CreateOrganizationRequest,
  UpdateOrganizationRequest,
  Connection,
  ConnectionType,
  ListConnectionsOptions,
  Directory,
  DirectoryUser,
  DirectoryGroup,
  ListDirectoriesOptions,
  ListDirectoryUsersOptions,
  ListDirectoryGroupsOptions,
  Webhook,
  CreateWebhookRequest,
  UpdateWebhookRequest,
  User,
  CreateUserRequest,
  UpdateUserRequest,
  ListUsersOptions,
  OrganizationMembership,
  CreateOrganizationMembershipRequest,
  ListOrganizationMembershipsOptions,
  OrganizationRole,
  CreateOrganizationRoleRequest,
  UpdateOrganizationRoleRequest,

  // Config
  WorkOSClientConfig,
  RetryConfig,
} from './types.js';

export { CONNECTION_TYPES } from './types.js';
