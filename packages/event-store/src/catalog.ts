/**
 * @quire/event-store — Event Catalog.
 *
 * Registry of every domain event type the engine writes:
 * - Typed event definitions (type string → payload validator)
 * - Schema versions, stamped into the event metadata
 * - Write-time validation (a store given a catalog rejects payloads
 *   that do not match, and event types nobody registered)
 *
 * Each component owns its schemas and exports them as a list; the
 * composition root registers them all into one catalog.
 */

import type { EventSource } from "@quire/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "invoice.issued") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which component emits this event */
  readonly source: EventSource;

  /** True if the payload is valid for this version */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same type replaces it
   * only with a higher version.
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version >= schema.version) {
      if (existing.version > schema.version) {
        throw new CatalogError(
          `"${schema.type}" is registered at version ${existing.version}; cannot downgrade to ${schema.version}`,
        );
      }
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  registerAll(schemas: readonly EventSchema[]): void {
    for (const schema of schemas) {
      this.register(schema);
    }
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate an event payload against its registered schema.
   * False for unregistered types.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
