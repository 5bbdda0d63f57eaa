/**
 * Durable per-key UI preferences. Keys may be dotted paths into nested
 * objects; `set` creates missing intermediate objects. Last write wins.
 */
import { z } from 'zod';
import type { JsonValue, StructuredLogger } from '../../core/kernel/contracts.js';
import type { DocumentStore } from '../../core/store/json-store.js';
import { JsonObjectSchema, isJsonObject } from '../../core/utils/json.js';
import { ValidationError, errorMessage } from '../../errors.js';

export type Preferences = { [key: string]: JsonValue };

export const PreferenceDocumentSchema = z.object({
  preferences: JsonObjectSchema,
});
export type PreferenceDocument = z.infer<typeof PreferenceDocumentSchema>;

export const DEFAULT_PREFERENCES: Preferences = {
  active_tab: 'chat',
  package_filters: {
    status: 'all',
    hide_system: false,
    search: '',
  },
  package_sort: {
    column: 'updated',
    direction: 'desc',
  },
  ui_toggles: {
    agents_panel: true,
  },
  theme: 'dark',
};

const RESERVED_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

function splitKey(key: string): string[] {
  const parts = key.split('.');
  if (parts.some((part) => part.length === 0 || RESERVED_SEGMENTS.has(part))) {
    throw new ValidationError(`Invalid preference key: ${key}`);
  }
  return parts;
}

function lookup(root: Preferences, parts: string[]): JsonValue | undefined {
  let current: JsonValue | undefined = root;
  for (const part of parts) {
    if (!isJsonObject(current) || !Object.hasOwn(current, part)) return undefined;
    current = current[part];
  }
  return current;
}

function cloneValue<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

export interface PreferenceStoreOptions {
  store: DocumentStore<PreferenceDocument>;
  logger: StructuredLogger;
  defaults?: Preferences;
}

export class PreferenceStore {
  private preferences: Preferences = {};
  private readonly defaults: Preferences;

  constructor(private readonly options: PreferenceStoreOptions) {
    this.defaults = options.defaults ?? DEFAULT_PREFERENCES;
  }

  async load(): Promise<void> {
    const document = await this.options.store.load();
    if (document) {
      this.preferences = document.preferences;
      return;
    }
    this.preferences = cloneValue(this.defaults);
    await this.persist();
  }

  getAll(): Preferences {
    return cloneValue(this.preferences);
  }

  /** Stored value at `key`, else the default at `key`, else null. */
  get(key: string): JsonValue {
    const parts = splitKey(key);
    const value = lookup(this.preferences, parts) ?? lookup(this.defaults, parts);
    return value === undefined ? null : cloneValue(value);
  }

  async set(key: string, value: JsonValue): Promise<JsonValue> {
    const parts = splitKey(key);
    let target: Preferences = this.preferences;
    for (const part of parts.slice(0, -1)) {
      const next = Object.hasOwn(target, part) ? target[part] : undefined;
      if (isJsonObject(next)) {
        target = next;
      } else {
        const created: Preferences = {};
        target[part] = created;
        target = created;
      }
    }
    target[parts[parts.length - 1]] = cloneValue(value);
    await this.persist();
    return this.get(key);
  }

  /** Shallow merge of top-level keys. */
  async update(updates: Preferences): Promise<Preferences> {
    for (const key of Object.keys(updates)) {
      if (RESERVED_SEGMENTS.has(key)) {
        throw new ValidationError(`Invalid preference key: ${key}`);
      }
    }
    Object.assign(this.preferences, cloneValue(updates));
    await this.persist();
    return this.getAll();
  }

  private async persist(): Promise<void> {
    try {
      await this.options.store.save({ preferences: this.preferences });
    } catch (error) {
      this.options.logger.error('Failed to persist preferences', { reason: errorMessage(error) });
    }
  }
}
