/**
 * Known webhook event names, loaded from data/webhook-events.json
 */

import { readFileSync } from 'node:fs';

let known: ReadonlySet<string> | undefined;

function loadKnownEvents(): ReadonlySet<string> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../../data/webhook-events.json', import.meta.url), 'utf-8')
  );
  if (!Array.isArray(raw)) {
    throw new Error('data/webhook-events.json must contain an array of event names');
  }
  return new Set(raw.filter((entry): entry is string => typeof entry === 'string'));
}

export function knownWebhookEvents(): ReadonlySet<string> {
  known ??= loadKnownEvents();
  return known;
}

export function isKnownWebhookEvent(event: string): boolean {
  return knownWebhookEvents().has(event);
}

/**
 * Configured events missing from the known list, in configuration order
 */
export function unknownWebhookEvents(events: readonly string[]): string[] {
  return events.filter((event) => !isKnownWebhookEvent(event));
}
