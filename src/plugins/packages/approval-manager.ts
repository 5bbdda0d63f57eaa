/**
 * @module plugins/packages/approval-manager
 *
 * Install-request lifecycle. Every status change goes through
 * {@link PackageApprovalManager.transition}, a synchronous check-and-set
 * against {@link TRANSITIONS}: the legality check and the write happen in the
 * same tick, so of two racing `approve` and `deny` calls exactly one wins and
 * the other sees `InvalidTransition`.
 *
 *   pending --approve--> approved --installed--> installed --uninstall--> uninstalled
 *   pending --deny--> denied         approved --failed--> failed
 *   {failed, uninstalled, denied} --retry--> approved
 */
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { EventBus } from '../../core/kernel/event-bus.js';
import type { DocumentStore } from '../../core/store/json-store.js';
import { KeyedMutex } from '../../core/utils/keyed-mutex.js';
import { InvalidTransitionError, NotFoundError, ValidationError, errorMessage } from '../../errors.js';
import { unknownMetadata } from './package-index.js';
import {
  PACKAGE_NAME_PATTERN,
  type PackageDocument,
  type PackageIndex,
  type PackageInstaller,
  type PackageMetadata,
  type PackageRecord,
  type PackageStatus,
  type RequestInstallInput,
  type SyncReport
} from './types.js';

declare module '../../core/kernel/event-bus.js' {
  interface EventMap {
    'packages:updated': { package: PackageRecord; previous: PackageStatus | null };
  }
}

export type PackageAction = 'approve' | 'deny' | 'retry' | 'uninstall' | 'installed' | 'failed';

export const TRANSITIONS: Record<PackageAction, { from: readonly PackageStatus[]; to: PackageStatus }> = {
  approve: { from: ['pending'], to: 'approved' },
  deny: { from: ['pending'], to: 'denied' },
  retry: { from: ['failed', 'uninstalled', 'denied'], to: 'approved' },
  uninstall: { from: ['installed'], to: 'uninstalled' },
  installed: { from: ['approved'], to: 'installed' },
  failed: { from: ['approved'], to: 'failed' },
};

export interface PackageApprovalManagerOptions {
  store: DocumentStore<PackageDocument>;
  index: PackageIndex;
  installer: PackageInstaller;
  events: EventBus;
  logger: StructuredLogger;
  now?: () => Date;
}

function cloneRecord(record: PackageRecord): PackageRecord {
  return {
    ...record,
    metadata: { ...record.metadata, safety_reasons: [...record.metadata.safety_reasons] },
  };
}

export class PackageApprovalManager {
  private readonly packages = new Map<string, PackageRecord>();
  private readonly locks = new KeyedMutex();
  private readonly now: () => Date;

  constructor(private readonly options: PackageApprovalManagerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<void> {
    const document = await this.options.store.load();
    this.packages.clear();
    for (const record of document?.packages ?? []) {
      this.packages.set(record.package_name, record);
    }
  }

  /**
   * Creates a `pending` request, or returns the existing record for that name
   * untouched. Metadata comes from the package index and is advisory only.
   */
  async requestInstall(input: RequestInstallInput): Promise<PackageRecord> {
    const name = input.package_name.trim();
    if (!PACKAGE_NAME_PATTERN.test(name)) {
      throw new ValidationError(`Invalid package name: ${name}`);
    }
    const existing = this.packages.get(name);
    if (existing) {
      return cloneRecord(existing);
    }

    const metadata = await this.lookupMetadata(name);

    // A concurrent request for the same name may have landed during the lookup.
    const raced = this.packages.get(name);
    if (raced) {
      return cloneRecord(raced);
    }

    const timestamp = this.now().toISOString();
    const record: PackageRecord = {
      package_name: name,
      status: 'pending',
      metadata,
      reason: input.reason,
      requested_by: input.requested_by,
      usage_count: 0,
      installed_version: null,
      last_error: null,
      requested_at: timestamp,
      approved_at: null,
      installed_at: null,
      last_used_at: null,
      updated_at: timestamp,
    };
    this.packages.set(name, record);
    this.options.logger.info('Package requested', {
      packageName: name,
      requestedBy: input.requested_by,
      safetyLevel: metadata.safety_level,
    });
    await this.changed(record, null);
    return cloneRecord(record);
  }

  async approve(name: string): Promise<PackageRecord> {
    return this.commit(name, 'approve', (record) => {
      record.approved_at = this.now().toISOString();
    });
  }

  async deny(name: string): Promise<PackageRecord> {
    return this.commit(name, 'deny');
  }

  async retry(name: string): Promise<PackageRecord> {
    return this.commit(name, 'retry', (record) => {
      record.approved_at = this.now().toISOString();
      record.last_error = null;
    });
  }

  /**
   * Removes the package from the environment, then commits `uninstalled`. When
   * the installer fails the record stays `installed` and the error propagates.
   */
  async uninstall(name: string): Promise<PackageRecord> {
    return this.locks.run(name, async () => {
      const record = this.require(name);
      if (!TRANSITIONS.uninstall.from.includes(record.status)) {
        throw new InvalidTransitionError('Package', record.status, 'uninstall');
      }
      await this.options.installer.uninstall(name);
      return this.commit(name, 'uninstall', (current) => {
        current.installed_version = null;
      });
    });
  }

  /** Install-worker report; legal only from `approved`. */
  async markInstalled(name: string, version: string): Promise<PackageRecord> {
    return this.commit(name, 'installed', (record) => {
      record.installed_version = version;
      record.installed_at = this.now().toISOString();
      record.last_error = null;
    });
  }

  /** Install-worker report; legal only from `approved`. */
  async markFailed(name: string, error: string): Promise<PackageRecord> {
    return this.commit(name, 'failed', (record) => {
      record.last_error = error;
    });
  }

  /**
   * Reconciles records with what the installer actually finds: unrecorded or
   * non-installed packages present in the environment become `installed`;
   * `installed` records missing from it become `uninstalled`.
   */
  async sync(): Promise<SyncReport> {
    const present = await this.options.installer.listInstalled();
    const report: SyncReport = { added: [], removed: [] };
    const timestamp = this.now().toISOString();

    for (const [name, version] of present) {
      const record = this.packages.get(name);
      if (record?.status === 'installed') continue;
      if (record && this.locks.isLocked(name)) continue;

      const previous = record?.status ?? null;
      const next: PackageRecord = record ?? {
        package_name: name,
        status: 'installed',
        metadata: unknownMetadata('Discovered in the environment'),
        reason: 'Found installed during sync',
        requested_by: 'sync',
        usage_count: 0,
        installed_version: version,
        last_error: null,
        requested_at: timestamp,
        approved_at: null,
        installed_at: timestamp,
        last_used_at: null,
        updated_at: timestamp,
      };
      next.status = 'installed';
      next.installed_version = version;
      next.installed_at = timestamp;
      next.updated_at = timestamp;
      this.packages.set(name, next);
      await this.changed(next, previous);
      report.added.push(cloneRecord(next));
    }

    for (const record of this.packages.values()) {
      if (record.status !== 'installed' || present.has(record.package_name)) continue;
      if (this.locks.isLocked(record.package_name)) continue;
      record.status = 'uninstalled';
      record.installed_version = null;
      record.updated_at = timestamp;
      await this.changed(record, 'installed');
      report.removed.push(cloneRecord(record));
    }

    this.options.logger.info('Package sync finished', {
      added: report.added.length,
      removed: report.removed.length,
    });
    return report;
  }

  list(status?: PackageStatus): PackageRecord[] {
    return [...this.packages.values()]
      .filter((record) => !status || record.status === status)
      .sort((a, b) => b.requested_at.localeCompare(a.requested_at) || a.package_name.localeCompare(b.package_name))
      .map(cloneRecord);
  }

  get(name: string): PackageRecord {
    return cloneRecord(this.require(name));
  }

  /** Live index lookup; creates no record. */
  async info(name: string): Promise<PackageMetadata> {
    const metadata = await this.options.index.lookup(name);
    if (!metadata) {
      throw new NotFoundError('Package', name);
    }
    return metadata;
  }

  async recordUsage(name: string): Promise<PackageRecord> {
    const record = this.require(name);
    record.usage_count += 1;
    record.last_used_at = this.now().toISOString();
    await this.persist();
    return cloneRecord(record);
  }

  /**
   * The legality check and the write run before the first await, so no
   * other transition on this name can interleave between them.
   */
  private async commit(
    name: string,
    action: PackageAction,
    apply?: (record: PackageRecord) => void
  ): Promise<PackageRecord> {
    const record = this.require(name);
    const rule = TRANSITIONS[action];
    if (!rule.from.includes(record.status)) {
      throw new InvalidTransitionError('Package', record.status, action);
    }

    const previous = record.status;
    record.status = rule.to;
    record.updated_at = this.now().toISOString();
    apply?.(record);
    this.options.logger.info('Package transition', { packageName: name, from: previous, to: rule.to });
    await this.changed(record, previous);
    return cloneRecord(record);
  }

  private require(name: string): PackageRecord {
    const record = this.packages.get(name);
    if (!record) {
      throw new NotFoundError('Package', name);
    }
    return record;
  }

  private async lookupMetadata(name: string): Promise<PackageMetadata> {
    try {
      return (await this.options.index.lookup(name)) ?? unknownMetadata('Not found in the package index');
    } catch (error) {
      this.options.logger.warn('Package metadata lookup failed', { packageName: name, reason: errorMessage(error) });
      return unknownMetadata('Package index unavailable');
    }
  }

  private async changed(record: PackageRecord, previous: PackageStatus | null): Promise<void> {
    this.options.events.publish('packages:updated', { package: cloneRecord(record), previous });
    await this.persist();
  }

  private async persist(): Promise<void> {
    try {
      await this.options.store.save({ packages: [...this.packages.values()] });
    } catch (error) {
      this.options.logger.error('Failed to persist packages', { reason: errorMessage(error) });
    }
  }
}
