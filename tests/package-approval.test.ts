import { describe, expect, test } from 'vitest';
import { EventBus } from '../src/core/kernel/event-bus.js';
import { MemoryDocumentStore } from '../src/core/store/json-store.js';
import { PackageApprovalManager } from '../src/plugins/packages/approval-manager.js';
import { PackageInstallWorker } from '../src/plugins/packages/install-worker.js';
import type { PackageDocument, PackageStatus } from '../src/plugins/packages/types.js';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../src/errors.js';
import { FakeIndex, FakeInstaller, noopLogger, sampleMetadata } from './helpers.js';

function setup() {
  const index = new FakeIndex();
  const installer = new FakeInstaller();
  const events = new EventBus();
  let tick = 0;
  const manager = new PackageApprovalManager({
    store: new MemoryDocumentStore<PackageDocument>(),
    index,
    installer,
    events,
    logger: noopLogger(),
    now: () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++)),
  });
  const worker = new PackageInstallWorker({ manager, installer, timeoutMs: 1_000, logger: noopLogger() });
  return { index, installer, events, manager, worker };
}

async function installedPackage(manager: PackageApprovalManager, name: string): Promise<void> {
  await manager.requestInstall({ package_name: name, reason: 'needed', requested_by: 'user' });
  await manager.approve(name);
  await manager.markInstalled(name, '1.0.0');
}

describe('PackageApprovalManager', () => {
  test('requestInstall creates a pending record with index metadata', async () => {
    const { index, manager } = setup();
    index.known.set('tidy-utils', sampleMetadata());

    const record = await manager.requestInstall({ package_name: ' tidy-utils ', reason: 'parse dates', requested_by: 'agent' });

    expect(record).toMatchObject({
      package_name: 'tidy-utils',
      status: 'pending',
      reason: 'parse dates',
      requested_by: 'agent',
      usage_count: 0,
      installed_version: null,
    });
    expect(record.metadata.safety_level).toBe('HIGH');
  });

  test('unknown or unreachable packages get UNKNOWN metadata', async () => {
    const { index, manager } = setup();
    const missing = await manager.requestInstall({ package_name: 'nowhere', reason: '', requested_by: 'user' });
    index.unavailable = true;
    const offline = await manager.requestInstall({ package_name: 'offline', reason: '', requested_by: 'user' });

    expect(missing.metadata.safety_level).toBe('UNKNOWN');
    expect(missing.metadata.safety_reasons).toEqual(['Not found in the package index']);
    expect(offline.metadata.safety_reasons).toEqual(['Package index unavailable']);
  });

  test('repeating a request returns the existing record', async () => {
    const { manager } = setup();
    await manager.requestInstall({ package_name: 'tidy-utils', reason: 'first', requested_by: 'user' });
    await manager.approve('tidy-utils');

    const again = await manager.requestInstall({ package_name: 'tidy-utils', reason: 'second', requested_by: 'agent' });
    expect(again.status).toBe('approved');
    expect(again.reason).toBe('first');
    expect(manager.list()).toHaveLength(1);
  });

  test('rejects invalid package names', async () => {
    const { manager } = setup();
    await expect(manager.requestInstall({ package_name: 'Bad Name!', reason: '', requested_by: 'user' })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  test('approve moves pending to approved and is illegal afterwards', async () => {
    const { manager } = setup();
    await manager.requestInstall({ package_name: 'tidy-utils', reason: '', requested_by: 'user' });

    const approved = await manager.approve('tidy-utils');
    expect(approved.status).toBe('approved');
    expect(approved.approved_at).not.toBeNull();

    await manager.markInstalled('tidy-utils', '2.1.0');
    await expect(manager.approve('tidy-utils')).rejects.toThrow('Cannot approve Package in state installed');
  });

  test('of a racing approve and deny exactly one wins', async () => {
    const { manager } = setup();
    await manager.requestInstall({ package_name: 'tidy-utils', reason: '', requested_by: 'user' });

    const outcomes = await Promise.allSettled([manager.approve('tidy-utils'), manager.deny('tidy-utils')]);
    const fulfilled = outcomes.filter((outcome) => outcome.status === 'fulfilled');
    const rejected = outcomes.filter((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');

    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(InvalidTransitionError);
    expect(manager.get('tidy-utils').status).toBe('approved');
  });

  test('retry is only legal from failed, uninstalled or denied', async () => {
    const { manager } = setup();
    await manager.requestInstall({ package_name: 'tidy-utils', reason: '', requested_by: 'user' });
    await expect(manager.retry('tidy-utils')).rejects.toBeInstanceOf(InvalidTransitionError);

    await manager.deny('tidy-utils');
    const retried = await manager.retry('tidy-utils');
    expect(retried.status).toBe('approved');
  });

  test('unknown packages are NotFound', async () => {
    const { manager } = setup();
    await expect(manager.approve('ghost')).rejects.toBeInstanceOf(NotFoundError);
    expect(() => manager.get('ghost')).toThrow('Package not found: ghost');
  });

  test('uninstall removes the package from the environment', async () => {
    const { installer, manager } = setup();
    await installedPackage(manager, 'tidy-utils');
    installer.installed.set('tidy-utils', '1.0.0');

    const record = await manager.uninstall('tidy-utils');
    expect(record.status).toBe('uninstalled');
    expect(record.installed_version).toBeNull();
    expect(installer.installed.has('tidy-utils')).toBe(false);
  });

  test('a failed uninstall leaves the record installed', async () => {
    const { installer, manager } = setup();
    await installedPackage(manager, 'tidy-utils');
    installer.failUninstall = 'package in use';

    await expect(manager.uninstall('tidy-utils')).rejects.toThrow('package in use');
    expect(manager.get('tidy-utils').status).toBe('installed');
    expect(manager.get('tidy-utils').installed_version).toBe('1.0.0');
  });

  test('uninstall of a package that is not installed is illegal', async () => {
    const { manager } = setup();
    await manager.requestInstall({ package_name: 'tidy-utils', reason: '', requested_by: 'user' });
    await expect(manager.uninstall('tidy-utils')).rejects.toThrow('Cannot uninstall Package in state pending');
  });

  test('sync reconciles records with the environment', async () => {
    const { installer, manager } = setup();
    await installedPackage(manager, 'gone');
    installer.installed.set('found', '3.0.0');

    const report = await manager.sync();

    expect(report.added.map((record) => record.package_name)).toEqual(['found']);
    expect(report.removed.map((record) => record.package_name)).toEqual(['gone']);
    const found = manager.get('found');
    expect(found).toMatchObject({
      status: 'installed',
      requested_by: 'sync',
      reason: 'Found installed during sync',
      installed_version: '3.0.0',
    });
    expect(found.metadata.safety_reasons).toEqual(['Discovered in the environment']);
    expect(manager.get('gone').status).toBe('uninstalled');
  });

  test('sync keeps the requester of a package it finds installed', async () => {
    const { installer, manager } = setup();
    await manager.requestInstall({ package_name: 'lodash', reason: 'collection helpers', requested_by: 'alice' });
    await manager.approve('lodash');
    installer.installed.set('lodash', '4.0.0');

    const report = await manager.sync();

    expect(report.added.map((record) => record.package_name)).toEqual(['lodash']);
    expect(manager.get('lodash')).toMatchObject({
      status: 'installed',
      requested_by: 'alice',
      reason: 'collection helpers',
      installed_version: '4.0.0',
    });
  });

  test('lists newest requests first and filters by status', async () => {
    const { manager } = setup();
    await manager.requestInstall({ package_name: 'older', reason: '', requested_by: 'user' });
    await manager.requestInstall({ package_name: 'newer', reason: '', requested_by: 'user' });
    await manager.deny('older');

    expect(manager.list().map((record) => record.package_name)).toEqual(['newer', 'older']);
    expect(manager.list('denied').map((record) => record.package_name)).toEqual(['older']);
  });

  test('info reads the index without creating a record', async () => {
    const { index, manager } = setup();
    index.known.set('tidy-utils', sampleMetadata({ version: '9.9.9' }));

    expect((await manager.info('tidy-utils')).version).toBe('9.9.9');
    await expect(manager.info('nowhere')).rejects.toBeInstanceOf(NotFoundError);
    expect(manager.list()).toEqual([]);
  });

  test('recordUsage counts uses', async () => {
    const { manager } = setup();
    await installedPackage(manager, 'tidy-utils');
    await manager.recordUsage('tidy-utils');
    const record = await manager.recordUsage('tidy-utils');

    expect(record.usage_count).toBe(2);
    expect(record.last_used_at).not.toBeNull();
  });

  test('publishes every transition', async () => {
    const { events, manager } = setup();
    const seen: Array<[PackageStatus | null, PackageStatus]> = [];
    events.subscribe('packages:updated', (event) => seen.push([event.payload.previous, event.payload.package.status]));

    await manager.requestInstall({ package_name: 'tidy-utils', reason: '', requested_by: 'user' });
    await manager.approve('tidy-utils');

    expect(seen).toEqual([
      [null, 'pending'],
      ['pending', 'approved'],
    ]);
  });
});

describe('PackageInstallWorker', () => {
  test('installs approved packages with the indexed version', async () => {
    const { index, installer, manager, worker } = setup();
    index.known.set('tidy-utils', sampleMetadata());
    await manager.requestInstall({ package_name: 'tidy-utils', reason: '', requested_by: 'user' });
    await manager.approve('tidy-utils');

    worker.enqueue('tidy-utils');
    worker.enqueue('tidy-utils');
    await worker.idle();

    expect(installer.installCalls).toEqual(['tidy-utils']);
    expect(manager.get('tidy-utils')).toMatchObject({ status: 'installed', installed_version: '2.1.0' });
  });

  test('records install failures and allows a retry', async () => {
    const { installer, manager, worker } = setup();
    installer.failInstall = 'registry refused';
    await manager.requestInstall({ package_name: 'tidy-utils', reason: '', requested_by: 'user' });
    await manager.approve('tidy-utils');

    worker.enqueue('tidy-utils');
    await worker.idle();
    expect(manager.get('tidy-utils')).toMatchObject({ status: 'failed', last_error: 'registry refused' });

    installer.failInstall = null;
    await manager.retry('tidy-utils');
    worker.enqueue('tidy-utils');
    await worker.idle();
    expect(manager.get('tidy-utils')).toMatchObject({ status: 'installed', installed_version: '1.0.0', last_error: null });
  });

  test('skips packages that are not approved', async () => {
    const { installer, manager, worker } = setup();
    await manager.requestInstall({ package_name: 'tidy-utils', reason: '', requested_by: 'user' });

    worker.enqueue('tidy-utils');
    await worker.idle();
    expect(installer.installCalls).toEqual([]);
    expect(manager.get('tidy-utils').status).toBe('pending');
  });

  test('sweep queues every approved package', async () => {
    const { manager, worker } = setup();
    for (const name of ['alpha', 'beta']) {
      await manager.requestInstall({ package_name: name, reason: '', requested_by: 'user' });
      await manager.approve(name);
    }

    expect(worker.sweep()).toBe(2);
    await worker.idle();
    expect(manager.list('installed').map((record) => record.package_name).sort()).toEqual(['alpha', 'beta']);
  });

  test('an install that outlives the timeout fails the package', async () => {
    const { manager } = setup();
    const hanging = new FakeInstaller();
    hanging.install = () => new Promise<{ version: string }>(() => undefined);
    const worker = new PackageInstallWorker({ manager, installer: hanging, timeoutMs: 10, logger: noopLogger() });
    await manager.requestInstall({ package_name: 'slow-pkg', reason: '', requested_by: 'user' });
    await manager.approve('slow-pkg');

    worker.enqueue('slow-pkg');
    await worker.idle();
    expect(manager.get('slow-pkg')).toMatchObject({
      status: 'failed',
      last_error: 'Install of slow-pkg timed out after 10ms',
    });
  });
});
