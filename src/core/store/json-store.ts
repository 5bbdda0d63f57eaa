/**
 * @module store/json-store
 *
 * One JSON document per owning component. Writes are serialized per file and
 * land atomically (tmp + rename); loads are validated with Zod. A document
 * that fails to parse is moved aside to `<file>.corrupt-<ts>` so the owner can
 * start empty without losing the evidence.
 */
import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';
import type { z } from 'zod';
import type { StructuredLogger } from '../kernel/contracts.js';
import { errorMessage } from '../../errors.js';

export interface DocumentStore<T> {
  /** Null when nothing was stored yet, or the stored document was corrupt. */
  load(): Promise<T | null>;
  save(value: T): Promise<void>;
  /** Resolves once every queued write has landed. */
  flush(): Promise<void>;
  readonly path: string | null;
}

export class JsonDocumentStore<T> implements DocumentStore<T> {
  private chain: Promise<void> = Promise.resolve();

  constructor(
    readonly path: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly logger: StructuredLogger
  ) {}

  async load(): Promise<T | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      await this.moveAside(`invalid JSON: ${errorMessage(error)}`);
      return null;
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      await this.moveAside(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
      return null;
    }
    return result.data;
  }

  save(value: T): Promise<void> {
    const snapshot = `${JSON.stringify(value, null, 2)}\n`;
    const next = this.chain
      .catch(() => undefined)
      .then(() => this.write(snapshot));
    this.chain = next;
    return next;
  }

  async flush(): Promise<void> {
    await this.chain.catch(() => undefined);
  }

  private async write(snapshot: string): Promise<void> {
    await fs.mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    await fs.writeFile(tmpPath, snapshot, 'utf8');
    await fs.rename(tmpPath, this.path);
  }

  private async moveAside(reason: string): Promise<void> {
    const backupPath = `${this.path}.corrupt-${Date.now()}`;
    try {
      await fs.rename(this.path, backupPath);
      this.logger.warn('Store file was corrupt and has been moved aside', {
        path: this.path,
        backupPath,
        reason
      });
    } catch (renameError) {
      this.logger.warn('Store file is corrupt', {
        path: this.path,
        reason: `${reason}; backup failed: ${errorMessage(renameError)}`
      });
    }
  }
}

/** Keeps nothing; used when no storage directory is configured. */
export class MemoryDocumentStore<T> implements DocumentStore<T> {
  readonly path = null;
  private value: T | null = null;

  async load(): Promise<T | null> {
    return this.value;
  }

  async save(value: T): Promise<void> {
    this.value = value;
  }

  async flush(): Promise<void> {}
}

export interface StoreFactory {
  open<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): DocumentStore<T>;
  flushAll(): Promise<void>;
}

export function createStoreFactory(dir: string | null, logger: StructuredLogger): StoreFactory {
  const opened: Array<{ flush(): Promise<void> }> = [];
  return {
    open: <T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): DocumentStore<T> => {
      const store: DocumentStore<T> = dir
        ? new JsonDocumentStore(join(dir, `${name}.json`), schema, logger)
        : new MemoryDocumentStore<T>();
      opened.push(store);
      return store;
    },
    flushAll: async () => {
      await Promise.all(opened.map((store) => store.flush()));
    }
  };
}
