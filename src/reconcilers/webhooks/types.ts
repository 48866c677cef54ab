/**
 * Types for webhook reconciliation
 */

export interface WebhookConfig {
  url: string;
  /** Write-only signing secret */
  secret: string;
  enabled?: boolean;
  /** Unordered set of event names */
  events: string[];
}

export interface WebhookState {
  id: string;
  url: string | null;
  /** Retained from configuration; never read back */
  secret: string | null;
  enabled: boolean | null;
  events: string[] | null;
  createdAt: string | null;
  updatedAt: string | null;
}
