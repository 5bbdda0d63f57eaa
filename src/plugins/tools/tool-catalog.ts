import { promises as fs } from 'node:fs';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { EventBus } from '../../core/kernel/event-bus.js';
import type { DocumentStore } from '../../core/store/json-store.js';
import { ForbiddenError, NotFoundError, ValidationError, errorMessage } from '../../errors.js';
import {
  SystemToolSeedSchema,
  type RegisterToolInput,
  type Tool,
  type ToolDocument
} from './types.js';

declare module '../../core/kernel/event-bus.js' {
  interface EventMap {
    'tools:registered': { tool: Tool };
    'tools:deleted': { tool: Tool };
  }
}

export const SYSTEM_TOOLS_FILE = new URL('../../../data/system-tools.json', import.meta.url);

export interface ToolCatalogOptions {
  store: DocumentStore<ToolDocument>;
  events: EventBus;
  logger: StructuredLogger;
  systemToolsFile?: URL | string;
  now?: () => Date;
}

export class ToolCatalog {
  private readonly tools = new Map<string, Tool>();
  private readonly now: () => Date;

  constructor(private readonly options: ToolCatalogOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /** Loads persisted tools, then (re)asserts every system tool from the seed file. */
  async load(): Promise<void> {
    const document = await this.options.store.load();
    this.tools.clear();
    for (const tool of document?.tools ?? []) {
      this.tools.set(tool.name, tool);
    }

    const seeds = SystemToolSeedSchema.parse(
      JSON.parse(await fs.readFile(this.options.systemToolsFile ?? SYSTEM_TOOLS_FILE, 'utf8'))
    );
    const timestamp = this.now().toISOString();
    for (const seed of seeds) {
      const existing = this.tools.get(seed.name);
      this.tools.set(seed.name, {
        name: seed.name,
        domain: seed.domain,
        description: seed.description,
        parameters: seed.parameters,
        usage_count: existing?.usage_count ?? 0,
        is_system: true,
        created_at: existing?.created_at ?? timestamp,
        last_used_at: existing?.last_used_at ?? null,
        file_path: null
      });
    }
    await this.persist();
  }

  async register(input: RegisterToolInput): Promise<Tool> {
    if (this.tools.has(input.name)) {
      throw new ValidationError(`Tool already registered: ${input.name}`);
    }
    const tool: Tool = {
      name: input.name,
      domain: input.domain ?? input.name.split('_')[0],
      description: input.description,
      parameters: input.parameters,
      usage_count: 0,
      is_system: false,
      created_at: this.now().toISOString(),
      last_used_at: null,
      file_path: input.file_path
    };
    this.tools.set(tool.name, tool);
    await this.persist();
    this.options.events.publish('tools:registered', { tool: { ...tool } });
    return { ...tool };
  }

  list(domain?: string): Tool[] {
    return [...this.tools.values()]
      .filter((tool) => !domain || tool.domain.toLowerCase() === domain.toLowerCase())
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((tool) => ({ ...tool }));
  }

  get(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new NotFoundError('Tool', name);
    }
    return { ...tool };
  }

  count(): number {
    return this.tools.size;
  }

  async recordUsage(name: string): Promise<Tool> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new NotFoundError('Tool', name);
    }
    tool.usage_count += 1;
    tool.last_used_at = this.now().toISOString();
    await this.persist();
    return { ...tool };
  }

  /** System tools are protected; the catalog is left untouched when deletion is refused. */
  async delete(name: string): Promise<Tool> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new NotFoundError('Tool', name);
    }
    if (tool.is_system) {
      throw new ForbiddenError(`Cannot delete system tool: ${name}`);
    }
    this.tools.delete(name);
    await this.persist();
    this.options.events.publish('tools:deleted', { tool: { ...tool } });
    return { ...tool };
  }

  private async persist(): Promise<void> {
    try {
      await this.options.store.save({ tools: [...this.tools.values()] });
    } catch (error) {
      this.options.logger.error('Failed to persist tools', { reason: errorMessage(error) });
    }
  }
}
