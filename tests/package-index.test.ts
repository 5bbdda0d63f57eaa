import { describe, expect, test } from 'vitest';
import { NpmRegistryIndex, safetyLevelFor, scorePackage, unknownMetadata } from '../src/plugins/packages/package-index.js';
import { TransientError } from '../src/errors.js';
import { noopLogger } from './helpers.js';

const NOW = new Date('2026-01-01T00:00:00.000Z');
const DAY_MS = 86_400_000;

describe('scorePackage', () => {
  test('rates an established, busy package HIGH', () => {
    const rating = scorePackage({
      firstRelease: new Date('2015-01-01T00:00:00.000Z'),
      lastRelease: new Date(NOW.getTime() - 30 * DAY_MS),
      downloadsLastMonth: 2_000_000,
      totalReleases: 60,
    }, NOW);

    expect(rating).toEqual({
      score: 100,
      level: 'HIGH',
      reasons: [
        'Established package (5+ years)',
        'Very popular (1M+ downloads/month)',
        'Recently updated (< 6 months)',
        'Many releases (50+)',
      ],
    });
  });

  test('rates a middling package MEDIUM', () => {
    const rating = scorePackage({
      firstRelease: new Date('2023-01-01T00:00:00.000Z'),
      lastRelease: new Date(NOW.getTime() - 300 * DAY_MS),
      downloadsLastMonth: 50_000,
      totalReleases: 10,
    }, NOW);

    expect(rating.score).toBe(50);
    expect(rating.level).toBe('MEDIUM');
  });

  test('falls back to UNKNOWN without facts', () => {
    const rating = scorePackage({ firstRelease: null, lastRelease: null, downloadsLastMonth: 0, totalReleases: 0 }, NOW);
    expect(rating).toEqual({
      score: 5,
      level: 'UNKNOWN',
      reasons: ['Unknown age', 'Low or unknown usage', 'Unknown update status', 'Very few releases (< 5)'],
    });
  });

  test('level thresholds', () => {
    expect(safetyLevelFor(75)).toBe('HIGH');
    expect(safetyLevelFor(74)).toBe('MEDIUM');
    expect(safetyLevelFor(50)).toBe('MEDIUM');
    expect(safetyLevelFor(25)).toBe('LOW');
    expect(safetyLevelFor(24)).toBe('UNKNOWN');
  });

  test('unknownMetadata carries its reason', () => {
    expect(unknownMetadata('Package index unavailable')).toMatchObject({
      safety_score: 0,
      safety_level: 'UNKNOWN',
      safety_reasons: ['Package index unavailable'],
      version: null,
    });
  });
});

describe('NpmRegistryIndex', () => {
  function createIndex(routes: Record<string, { status: number; body?: unknown }>, requested: string[] = []) {
    const fetchImpl: typeof fetch = async (input) => {
      const url = String(input);
      requested.push(url);
      const route = routes[url];
      if (!route) {
        throw new Error(`connection refused: ${url}`);
      }
      return new Response(JSON.stringify(route.body ?? {}), { status: route.status });
    };
    return new NpmRegistryIndex({
      registryUrl: 'https://registry.example.test/',
      downloadsUrl: 'https://downloads.example.test',
      timeoutMs: 1_000,
      logger: noopLogger(),
      fetchImpl,
      now: () => NOW,
    });
  }

  test('builds metadata from the registry document and download stats', async () => {
    const requested: string[] = [];
    const index = createIndex({
      'https://registry.example.test/tidy-utils': {
        status: 200,
        body: {
          'dist-tags': { latest: '1.4.0' },
          time: {
            created: '2012-04-01T00:00:00.000Z',
            modified: '2021-02-20T00:00:00.000Z',
            '1.0.0': '2012-04-01T00:00:00.000Z',
            '1.4.0': '2021-02-20T00:00:00.000Z',
          },
          versions: { '1.0.0': {}, '1.4.0': {} },
          description: 'Small helpers',
          author: { name: 'Test Author' },
        },
      },
      'https://downloads.example.test/tidy-utils': { status: 200, body: { downloads: 5_000 } },
    }, requested);

    const metadata = await index.lookup('tidy-utils');

    expect(requested).toEqual([
      'https://registry.example.test/tidy-utils',
      'https://downloads.example.test/tidy-utils',
    ]);
    expect(metadata).toEqual({
      safety_score: 35,
      safety_level: 'LOW',
      safety_reasons: [
        'Established package (5+ years)',
        'Low or unknown usage',
        'Not updated for over a year',
        'Very few releases (< 5)',
      ],
      version: '1.4.0',
      author: 'Test Author',
      downloads_last_month: 5_000,
      first_release: '2012-04-01T00:00:00.000Z',
      last_release: '2021-02-20T00:00:00.000Z',
      total_releases: 2,
      description: 'Small helpers',
    });
  });

  test('encodes scoped names and tolerates missing download stats', async () => {
    const requested: string[] = [];
    const index = createIndex({
      'https://registry.example.test/@acme%2Fwidgets': { status: 200, body: { author: 'Acme' } },
    }, requested);

    const metadata = await index.lookup('@acme/widgets');
    expect(requested[0]).toBe('https://registry.example.test/@acme%2Fwidgets');
    expect(metadata?.downloads_last_month).toBe(0);
    expect(metadata?.author).toBe('Acme');
    expect(metadata?.version).toBeNull();
  });

  test('returns null for unknown packages', async () => {
    const index = createIndex({ 'https://registry.example.test/nowhere': { status: 404 } });
    expect(await index.lookup('nowhere')).toBeNull();
  });

  test('server errors and unreachable registries are transient', async () => {
    const index = createIndex({ 'https://registry.example.test/broken': { status: 503 } });
    await expect(index.lookup('broken')).rejects.toThrow('Registry lookup failed: HTTP 503');
    await expect(index.lookup('unrouted')).rejects.toBeInstanceOf(TransientError);
  });
});
