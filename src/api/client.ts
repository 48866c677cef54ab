/**
 * WorkOS API Client
 *
 * Provides a typed interface to the WorkOS REST API with:
 * - Rate limit handling (429 status) with Retry-After support
 * - Error classification into a semantic taxonomy
 * - JSON logging with secret redaction
 * - Capability tags separating read-only families from mutable ones
 */

import type {
  Connection,
  CreateOrganizationMembershipRequest,
  CreateOrganizationRequest,
  CreateOrganizationRoleRequest,
  CreateUserRequest,
  CreateWebhookRequest,
  Directory,
  DirectoryGroup,
  DirectoryUser,
  ListConnectionsOptions,
  ListDirectoriesOptions,
  ListDirectoryGroupsOptions,
  ListDirectoryUsersOptions,
  ListOrganizationMembershipsOptions,
  ListResponse,
  ListUsersOptions,
  Organization,
  OrganizationMembership,
  OrganizationRole,
  PaginationParams,
  QueryParams,
  RequestOptions,
  UpdateOrganizationRequest,
  UpdateOrganizationRoleRequest,
  UpdateUserRequest,
  UpdateWebhookRequest,
  User,
  Webhook,
  WorkOSClientConfig,
} from './types.js';
import { createTransport, type Transport } from './transport.js';
import { notFoundError } from './errors.js';

// =============================================================================
// Capability-tagged client shapes
// =============================================================================

/**
 * What an entity family allows against the current API generation
 */
export type Capability = 'read-only' | 'create-delete' | 'crud';

/**
 * Entity family that can only be fetched
 */
export interface ReadOnlyEntityClient<T, TListOptions extends PaginationParams = PaginationParams> {
  readonly capability: 'read-only';
  retrieve(id: string, options?: RequestOptions): Promise<T>;
  list(filters?: TListOptions, options?: RequestOptions): Promise<ListResponse<T>>;
  /** Follows `after` cursors until the last page */
  listAll(filters?: Omit<TListOptions, 'after' | 'before'>, options?: RequestOptions): Promise<T[]>;
}

/**
 * Entity family with the full create/update/delete surface
 */
export interface CrudEntityClient<T, TCreate, TUpdate, TListOptions extends PaginationParams = PaginationParams>
  extends Omit<ReadOnlyEntityClient<T, TListOptions>, 'capability'> {
  readonly capability: 'crud';
  create(request: TCreate, options?: RequestOptions): Promise<T>;
  update(id: string, request: TUpdate, options?: RequestOptions): Promise<T>;
  delete(id: string, options?: RequestOptions): Promise<void>;
}

// =============================================================================
// Entity clients
// =============================================================================

export interface OrganizationsClient
  extends CrudEntityClient<Organization, CreateOrganizationRequest, UpdateOrganizationRequest> {
  /** First organization owning the domain; not-found when none does */
  findByDomain(domain: string, options?: RequestOptions): Promise<Organization>;
}

export interface ConnectionsClient extends ReadOnlyEntityClient<Connection, ListConnectionsOptions> {
  findByOrganizationAndType(organizationId: string, connectionType: string, options?: RequestOptions): Promise<Connection>;
}

export interface DirectoriesClient extends ReadOnlyEntityClient<Directory, ListDirectoriesOptions> {
  findByOrganization(organizationId: string, options?: RequestOptions): Promise<Directory>;
}

export interface DirectoryUsersClient extends ReadOnlyEntityClient<DirectoryUser, ListDirectoryUsersOptions> {
  findByEmail(directoryId: string, email: string, options?: RequestOptions): Promise<DirectoryUser>;
}

export interface DirectoryGroupsClient extends ReadOnlyEntityClient<DirectoryGroup, ListDirectoryGroupsOptions> {
  /** The API has no name filter; matching happens client-side */
  findByName(directoryId: string, name: string, options?: RequestOptions): Promise<DirectoryGroup>;
}

export type WebhooksClient = CrudEntityClient<Webhook, CreateWebhookRequest, UpdateWebhookRequest>;

export interface UsersClient extends CrudEntityClient<User, CreateUserRequest, UpdateUserRequest, ListUsersOptions> {
  findByEmail(email: string, options?: RequestOptions): Promise<User>;
}

/**
 * Memberships have no update endpoint, only status transitions
 */
export interface MembershipsClient
  extends Omit<ReadOnlyEntityClient<OrganizationMembership, ListOrganizationMembershipsOptions>, 'capability'> {
  readonly capability: 'create-delete';
  create(request: CreateOrganizationMembershipRequest, options?: RequestOptions): Promise<OrganizationMembership>;
  delete(id: string, options?: RequestOptions): Promise<void>;
  deactivate(id: string, options?: RequestOptions): Promise<OrganizationMembership>;
  reactivate(id: string, options?: RequestOptions): Promise<OrganizationMembership>;
}

/**
 * Organization roles are addressed by (organizationId, slug)
 */
export interface RolesClient {
  readonly capability: 'crud';
  list(organizationId: string, options?: RequestOptions): Promise<ListResponse<OrganizationRole>>;
  retrieve(organizationId: string, slug: string, options?: RequestOptions): Promise<OrganizationRole>;
  create(organizationId: string, request: CreateOrganizationRoleRequest, options?: RequestOptions): Promise<OrganizationRole>;
  update(
    organizationId: string,
    slug: string,
    request: UpdateOrganizationRoleRequest,
    options?: RequestOptions
  ): Promise<OrganizationRole>;
  delete(organizationId: string, slug: string, options?: RequestOptions): Promise<void>;
  /** Role endpoints are slug-addressed; lookup by id lists and matches */
  findById(organizationId: string, roleId: string, options?: RequestOptions): Promise<OrganizationRole>;
}

/**
 * Main WorkOS client interface
 */
export interface WorkOSClient {
  readonly organizations: OrganizationsClient;
  readonly connections: ConnectionsClient;
  readonly directories: DirectoriesClient;
  readonly directoryUsers: DirectoryUsersClient;
  readonly directoryGroups: DirectoryGroupsClient;
  readonly webhooks: WebhooksClient;
  readonly users: UsersClient;
  readonly memberships: MembershipsClient;
  readonly roles: RolesClient;

  /** Get current configuration (with redacted secrets) */
  getConfig(): { baseUrl: string; clientId?: string; hasApiKey: boolean };
}

// =============================================================================
// Helpers
// =============================================================================

const PAGE_SIZE = 100;

function paginationParams(options: PaginationParams): QueryParams {
  return {
    limit: options.limit,
    before: options.before,
    after: options.after,
    order: options.order,
  };
}

function first<T>(response: ListResponse<T>, message: string): T {
  const [item] = response.data;
  if (item === undefined) {
    throw notFoundError(message);
  }
  return item;
}

/**
 * Collect every page of a cursor-paginated list
 */
export async function collectPages<T>(
  fetchPage: (after: string | undefined) => Promise<ListResponse<T>>
): Promise<T[]> {
  const items: T[] = [];
  let after: string | undefined;
  do {
    const page = await fetchPage(after);
    items.push(...page.data);
    after = page.list_metadata.after ?? undefined;
  } while (after);
  return items;
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a WorkOS API client
 *
 * @param config - Client configuration options
 * @param transport - Optional pre-built transport (shared between clients)
 */
export function createClient(config: WorkOSClientConfig, transport: Transport = createTransport(config)): WorkOSClient {
  const http = transport;

  // ---------------------------------------------------------------------------
  // Organizations Client
  // ---------------------------------------------------------------------------

  const organizations: OrganizationsClient = {
    capability: 'crud',

    async list(filters: PaginationParams = {}, options?: RequestOptions) {
      return http.get<ListResponse<Organization>>('/organizations', {
        ...options,
        params: paginationParams(filters),
      });
    },

    async listAll(filters: PaginationParams = {}, options?: RequestOptions) {
      return collectPages((after) => organizations.list({ limit: PAGE_SIZE, ...filters, after }, options));
    },

    async retrieve(id: string, options?: RequestOptions) {
      return http.get<Organization>(`/organizations/${encodeURIComponent(id)}`, options);
    },

    async create(req: CreateOrganizationRequest, options?: RequestOptions) {
      return http.post<Organization>(
        '/organizations',
        {
          name: req.name,
          domain_data: req.domainData,
          allow_profiles_outside_organization: req.allowProfilesOutsideOrganization,
        },
        options
      );
    },

    async update(id: string, req: UpdateOrganizationRequest, options?: RequestOptions) {
      return http.put<Organization>(
        `/organizations/${encodeURIComponent(id)}`,
        {
          name: req.name,
          domain_data: req.domainData,
          allow_profiles_outside_organization: req.allowProfilesOutsideOrganization,
        },
        options
      );
    },

    async delete(id: string, options?: RequestOptions) {
      return http.delete(`/organizations/${encodeURIComponent(id)}`, options);
    },

    async findByDomain(domain: string, options?: RequestOptions) {
      const response = await http.get<ListResponse<Organization>>('/organizations', {
        ...options,
        params: { domains: domain },
      });
      return first(response, `no organization found with domain: ${domain}`);
    },
  };

  // ---------------------------------------------------------------------------
  // Connections Client (read-only)
  // ---------------------------------------------------------------------------

  const connections: ConnectionsClient = {
    capability: 'read-only',

    async list(filters: ListConnectionsOptions = {}, options?: RequestOptions) {
      return http.get<ListResponse<Connection>>('/connections', {
        ...options,
        params: {
          organization_id: filters.organizationId,
          connection_type: filters.connectionType,
          ...paginationParams(filters),
        },
      });
    },

    async listAll(filters: ListConnectionsOptions = {}, options?: RequestOptions) {
      return collectPages((after) => connections.list({ limit: PAGE_SIZE, ...filters, after }, options));
    },

    async retrieve(id: string, options?: RequestOptions) {
      return http.get<Connection>(`/connections/${encodeURIComponent(id)}`, options);
    },

    async findByOrganizationAndType(organizationId: string, connectionType: string, options?: RequestOptions) {
      const response = await connections.list({ organizationId, connectionType }, options);
      return first(response, `no connection found for organization ${organizationId} with type ${connectionType}`);
    },
  };

  // ---------------------------------------------------------------------------
  // Directories Client (read-only)
  // ---------------------------------------------------------------------------

  const directories: DirectoriesClient = {
    capability: 'read-only',

    async list(filters: ListDirectoriesOptions = {}, options?: RequestOptions) {
      return http.get<ListResponse<Directory>>('/directories', {
        ...options,
        params: {
          organization_id: filters.organizationId,
          ...paginationParams(filters),
        },
      });
    },

    async listAll(filters: ListDirectoriesOptions = {}, options?: RequestOptions) {
      return collectPages((after) => directories.list({ limit: PAGE_SIZE, ...filters, after }, options));
    },

    async retrieve(id: string, options?: RequestOptions) {
      return http.get<Directory>(`/directories/${encodeURIComponent(id)}`, options);
    },

    async findByOrganization(organizationId: string, options?: RequestOptions) {
      const response = await directories.list({ organizationId }, options);
      return first(response, `no directory found for organization ${organizationId}`);
    },
  };

  // ---------------------------------------------------------------------------
  // Directory Users / Groups Clients (read-only)
  // ---------------------------------------------------------------------------

  const directoryUsers: DirectoryUsersClient = {
    capability: 'read-only',

    async list(filters: ListDirectoryUsersOptions = {}, options?: RequestOptions) {
      return http.get<ListResponse<DirectoryUser>>('/directory_users', {
        ...options,
        params: {
          directory: filters.directoryId,
          group: filters.groupId,
          ...paginationParams(filters),
        },
      });
    },

    async listAll(filters: ListDirectoryUsersOptions = {}, options?: RequestOptions) {
      return collectPages((after) => directoryUsers.list({ limit: PAGE_SIZE, ...filters, after }, options));
    },

    async retrieve(id: string, options?: RequestOptions) {
      return http.get<DirectoryUser>(`/directory_users/${encodeURIComponent(id)}`, options);
    },

    async findByEmail(directoryId: string, email: string, options?: RequestOptions) {
      const response = await http.get<ListResponse<DirectoryUser>>('/directory_users', {
        ...options,
        params: { directory: directoryId, emails: email },
      });
      return first(response, `no user found with email ${email} in directory ${directoryId}`);
    },
  };

  const directoryGroups: DirectoryGroupsClient = {
    capability: 'read-only',

    async list(filters: ListDirectoryGroupsOptions = {}, options?: RequestOptions) {
      return http.get<ListResponse<DirectoryGroup>>('/directory_groups', {
        ...options,
        params: {
          directory: filters.directoryId,
          user: filters.userId,
          ...paginationParams(filters),
        },
      });
    },

    async listAll(filters: ListDirectoryGroupsOptions = {}, options?: RequestOptions) {
      return collectPages((after) => directoryGroups.list({ limit: PAGE_SIZE, ...filters, after }, options));
    },

    async retrieve(id: string, options?: RequestOptions) {
      return http.get<DirectoryGroup>(`/directory_groups/${encodeURIComponent(id)}`, options);
    },

    async findByName(directoryId: string, name: string, options?: RequestOptions) {
      const groups = await directoryGroups.listAll({ directoryId }, options);
      const match = groups.find((group) => group.name === name);
      if (!match) {
        throw notFoundError(`no group found with name ${name} in directory ${directoryId}`);
      }
      return match;
    },
  };

  // ---------------------------------------------------------------------------
  // Webhooks Client
  // ---------------------------------------------------------------------------

  const webhooks: WebhooksClient = {
    capability: 'crud',

    async list(filters: PaginationParams = {}, options?: RequestOptions) {
      return http.get<ListResponse<Webhook>>('/webhooks', { ...options, params: paginationParams(filters) });
    },

    async listAll(filters: PaginationParams = {}, options?: RequestOptions) {
      return collectPages((after) => webhooks.list({ limit: PAGE_SIZE, ...filters, after }, options));
    },

    async retrieve(id: string, options?: RequestOptions) {
      return http.get<Webhook>(`/webhooks/${encodeURIComponent(id)}`, options);
    },

    async create(req: CreateWebhookRequest, options?: RequestOptions) {
      return http.post<Webhook>(
        '/webhooks',
        { url: req.url, secret: req.secret, enabled: req.enabled, events: req.events },
        options
      );
    },

    async update(id: string, req: UpdateWebhookRequest, options?: RequestOptions) {
      return http.put<Webhook>(
        `/webhooks/${encodeURIComponent(id)}`,
        { url: req.url, secret: req.secret, enabled: req.enabled, events: req.events },
        options
      );
    },

    async delete(id: string, options?: RequestOptions) {
      return http.delete(`/webhooks/${encodeURIComponent(id)}`, options);
    },
  };

  // ---------------------------------------------------------------------------
  // Users Client
  // ---------------------------------------------------------------------------

  const users: UsersClient = {
    capability: 'crud',

    async list(filters: ListUsersOptions = {}, options?: RequestOptions) {
      return http.get<ListResponse<User>>('/user_management/users', {
        ...options,
        params: {
          email: filters.email,
          organization_id: filters.organizationId,
          ...paginationParams(filters),
        },
      });
    },

    async listAll(filters: ListUsersOptions = {}, options?: RequestOptions) {
      return collectPages((after) => users.list({ limit: PAGE_SIZE, ...filters, after }, options));
    },

    async retrieve(id: string, options?: RequestOptions) {
      return http.get<User>(`/user_management/users/${encodeURIComponent(id)}`, options);
    },

    async create(req: CreateUserRequest, options?: RequestOptions) {
      return http.post<User>(
        '/user_management/users',
        {
          email: req.email,
          email_verified: req.emailVerified,
          first_name: req.firstName,
          last_name: req.lastName,
          password: req.password,
          password_hash: req.passwordHash,
          password_hash_type: req.passwordHashType,
        },
        options
      );
    },

    async update(id: string, req: UpdateUserRequest, options?: RequestOptions) {
      return http.put<User>(
        `/user_management/users/${encodeURIComponent(id)}`,
        {
          email: req.email,
          email_verified: req.emailVerified,
          first_name: req.firstName,
          last_name: req.lastName,
          password: req.password,
          password_hash: req.passwordHash,
          password_hash_type: req.passwordHashType,
        },
        options
      );
    },

    async delete(id: string, options?: RequestOptions) {
      return http.delete(`/user_management/users/${encodeURIComponent(id)}`, options);
    },

    async findByEmail(email: string, options?: RequestOptions) {
      const response = await users.list({ email }, options);
      return first(response, `no user found with email: ${email}`);
    },
  };

  // ---------------------------------------------------------------------------
  // Organization Memberships Client
  // ---------------------------------------------------------------------------

  const memberships: MembershipsClient = {
    capability: 'create-delete',

    async list(filters: ListOrganizationMembershipsOptions = {}, options?: RequestOptions) {
      return http.get<ListResponse<OrganizationMembership>>('/user_management/organization_memberships', {
        ...options,
        params: {
          user_id: filters.userId,
          organization_id: filters.organizationId,
          ...paginationParams(filters),
        },
      });
    },

    async listAll(filters: ListOrganizationMembershipsOptions = {}, options?: RequestOptions) {
      return collectPages((after) => memberships.list({ limit: PAGE_SIZE, ...filters, after }, options));
    },

    async retrieve(id: string, options?: RequestOptions) {
      return http.get<OrganizationMembership>(
        `/user_management/organization_memberships/${encodeURIComponent(id)}`,
        options
      );
    },

    async create(req: CreateOrganizationMembershipRequest, options?: RequestOptions) {
      return http.post<OrganizationMembership>(
        '/user_management/organization_memberships',
        {
          user_id: req.userId,
          organization_id: req.organizationId,
          role_slug: req.roleSlug,
        },
        options
      );
    },

    async delete(id: string, options?: RequestOptions) {
      return http.delete(`/user_management/organization_memberships/${encodeURIComponent(id)}`, options);
    },

    async deactivate(id: string, options?: RequestOptions) {
      return http.put<OrganizationMembership>(
        `/user_management/organization_memberships/${encodeURIComponent(id)}/deactivate`,
        undefined,
        options
      );
    },

    async reactivate(id: string, options?: RequestOptions) {
      return http.put<OrganizationMembership>(
        `/user_management/organization_memberships/${encodeURIComponent(id)}/reactivate`,
        undefined,
        options
      );
    },
  };

  // ---------------------------------------------------------------------------
  // Organization Roles Client
  // ---------------------------------------------------------------------------

  const rolesPath = (organizationId: string): string =>
    `/authorization/organizations/${encodeURIComponent(organizationId)}/roles`;

  const roles: RolesClient = {
    capability: 'crud',

    async list(organizationId: string, options?: RequestOptions) {
      return http.get<ListResponse<OrganizationRole>>(rolesPath(organizationId), options);
    },

    async retrieve(organizationId: string, slug: string, options?: RequestOptions) {
      return http.get<OrganizationRole>(`${rolesPath(organizationId)}/${encodeURIComponent(slug)}`, options);
    },

    async create(organizationId: string, req: CreateOrganizationRoleRequest, options?: RequestOptions) {
      return http.post<OrganizationRole>(
        rolesPath(organizationId),
        { slug: req.slug, name: req.name, description: req.description },
        options
      );
    },

    async update(organizationId: string, slug: string, req: UpdateOrganizationRoleRequest, options?: RequestOptions) {
      return http.patch<OrganizationRole>(
        `${rolesPath(organizationId)}/${encodeURIComponent(slug)}`,
        { name: req.name, description: req.description },
        options
      );
    },

    async delete(organizationId: string, slug: string, options?: RequestOptions) {
      return http.delete(`${rolesPath(organizationId)}/${encodeURIComponent(slug)}`, options);
    },

    async findById(organizationId: string, roleId: string, options?: RequestOptions) {
      const response = await roles.list(organizationId, options);
      const match = response.data.find((role) => role.id === roleId);
      if (!match) {
        throw notFoundError(`no organization role found with ID: ${roleId}`);
      }
      return match;
    },
  };

  return {
    organizations,
    connections,
    directories,
    directoryUsers,
    directoryGroups,
    webhooks,
    users,
    memberships,
    roles,

    getConfig() {
      return {
        baseUrl: http.baseUrl,
        clientId: http.clientId,
        hasApiKey: Boolean(config.apiKey),
      };
    },
  };
}
