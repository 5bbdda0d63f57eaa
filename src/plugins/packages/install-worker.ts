/**
 * Installs `approved` packages one at a time and reports the outcome back to
 * the approval manager. Requests for a name already queued are coalesced.
 */
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import { withTimeout } from '../../core/utils/timing.js';
import { ExecutionTimeoutError, InvalidTransitionError, errorMessage } from '../../errors.js';
import type { PackageApprovalManager } from './approval-manager.js';
import type { PackageInstaller } from './types.js';

export interface PackageInstallWorkerOptions {
  manager: PackageApprovalManager;
  installer: PackageInstaller;
  timeoutMs: number;
  logger: StructuredLogger;
}

export class PackageInstallWorker {
  private readonly queued = new Set<string>();
  private chain: Promise<void> = Promise.resolve();
  private stopped = false;

  constructor(private readonly options: PackageInstallWorkerOptions) {}

  /** Queues every package currently `approved`, e.g. after a restart. */
  sweep(): number {
    const approved = this.options.manager.list('approved');
    for (const record of approved) this.enqueue(record.package_name);
    return approved.length;
  }

  enqueue(name: string): void {
    if (this.stopped || this.queued.has(name)) return;
    this.queued.add(name);
    this.chain = this.chain.then(() => this.process(name));
  }

  /** Resolves once every queued install has been reported. */
  idle(): Promise<void> {
    return this.chain;
  }

  async stop(): Promise<void> {
    this.stopped = true;
    await this.chain;
  }

  private async process(name: string): Promise<void> {
    this.queued.delete(name);
    const { manager, installer, logger, timeoutMs } = this.options;

    const record = manager.list('approved').find((item) => item.package_name === name);
    if (!record) return;

    try {
      const { version } = await withTimeout(
        installer.install(name, record.metadata.version ?? undefined),
        timeoutMs,
        () => new ExecutionTimeoutError(`Install of ${name} timed out after ${timeoutMs}ms`, timeoutMs)
      );
      await manager.markInstalled(name, version);
      logger.info('Package installed', { packageName: name, version });
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        logger.warn('Package changed state during install', { packageName: name, reason: error.message });
        return;
      }
      logger.error('Package install failed', { packageName: name, reason: errorMessage(error) });
      await this.reportFailure(name, errorMessage(error));
    }
  }

  private async reportFailure(name: string, message: string): Promise<void> {
    try {
      await this.options.manager.markFailed(name, message);
    } catch (error) {
      this.options.logger.warn('Could not record install failure', { packageName: name, reason: errorMessage(error) });
    }
  }
}
