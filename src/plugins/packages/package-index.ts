/**
 * Package metadata from the npm registry and downloads API, with an advisory
 * safety score. The score never gates a transition on its own.
 */
import { z } from 'zod';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import { TransientError, errorMessage } from '../../errors.js';
import type { PackageIndex, PackageMetadata, SafetyLevel } from './types.js';

const DAY_MS = 86_400_000;

export interface PackageFacts {
  firstRelease: Date | null;
  lastRelease: Date | null;
  downloadsLastMonth: number;
  totalReleases: number;
}

export interface SafetyRating {
  score: number;
  level: SafetyLevel;
  reasons: string[];
}

export function safetyLevelFor(score: number): SafetyLevel {
  if (score >= 75) return 'HIGH';
  if (score >= 50) return 'MEDIUM';
  if (score >= 25) return 'LOW';
  return 'UNKNOWN';
}

/** Age (max 25) + popularity (max 30) + maintenance (max 25) + release count (max 20). */
export function scorePackage(facts: PackageFacts, now: Date = new Date()): SafetyRating {
  let score = 0;
  const reasons: string[] = [];

  if (facts.firstRelease) {
    const ageYears = (now.getTime() - facts.firstRelease.getTime()) / DAY_MS / 365;
    if (ageYears >= 5) {
      score += 25;
      reasons.push('Established package (5+ years)');
    } else if (ageYears >= 2) {
      score += 15;
      reasons.push('Moderately mature (2-5 years)');
    } else {
      score += 5;
      reasons.push('New package (< 2 years)');
    }
  } else {
    reasons.push('Unknown age');
  }

  if (facts.downloadsLastMonth >= 1_000_000) {
    score += 30;
    reasons.push('Very popular (1M+ downloads/month)');
  } else if (facts.downloadsLastMonth >= 100_000) {
    score += 20;
    reasons.push('Popular (100K+ downloads/month)');
  } else if (facts.downloadsLastMonth >= 10_000) {
    score += 10;
    reasons.push('Moderate usage (10K+ downloads/month)');
  } else {
    score += 5;
    reasons.push('Low or unknown usage');
  }

  if (facts.lastRelease) {
    const daysSinceUpdate = (now.getTime() - facts.lastRelease.getTime()) / DAY_MS;
    if (daysSinceUpdate <= 180) {
      score += 25;
      reasons.push('Recently updated (< 6 months)');
    } else if (daysSinceUpdate <= 365) {
      score += 15;
      reasons.push('Updated within a year');
    } else {
      score += 5;
      reasons.push('Not updated for over a year');
    }
  } else {
    reasons.push('Unknown update status');
  }

  if (facts.totalReleases >= 50) {
    score += 20;
    reasons.push('Many releases (50+)');
  } else if (facts.totalReleases >= 20) {
    score += 15;
    reasons.push('Regular releases (20+)');
  } else if (facts.totalReleases >= 5) {
    score += 10;
    reasons.push('Few releases (5-20)');
  } else {
    reasons.push('Very few releases (< 5)');
  }

  return { score, level: safetyLevelFor(score), reasons };
}

/** Metadata used when the index cannot be reached or does not know the package. */
export function unknownMetadata(reason: string): PackageMetadata {
  return {
    safety_score: 0,
    safety_level: 'UNKNOWN',
    safety_reasons: [reason],
    version: null,
    author: null,
    downloads_last_month: 0,
    first_release: null,
    last_release: null,
    total_releases: 0,
    description: null,
  };
}

const RegistryDocumentSchema = z.object({
  'dist-tags': z.object({ latest: z.string().optional() }).partial().default({}),
  time: z.record(z.string()).default({}),
  versions: z.record(z.unknown()).default({}),
  description: z.string().optional(),
  author: z.union([z.string(), z.object({ name: z.string().optional() })]).optional(),
});

const DownloadsSchema = z.object({ downloads: z.number().int().nonnegative() });

export interface NpmRegistryIndexOptions {
  registryUrl: string;
  downloadsUrl: string;
  timeoutMs: number;
  logger: StructuredLogger;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export class NpmRegistryIndex implements PackageIndex {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: NpmRegistryIndexOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async lookup(name: string): Promise<PackageMetadata | null> {
    const encoded = name.replace('/', '%2F');
    const response = await this.request(`${this.options.registryUrl.replace(/\/$/, '')}/${encoded}`);
    if (response.status === 404) {
      this.options.logger.warn('Package not found in registry', { packageName: name });
      return null;
    }
    if (!response.ok) {
      throw new TransientError(`Registry lookup failed: HTTP ${response.status}`);
    }

    const document = RegistryDocumentSchema.parse(await response.json());
    const releaseDates = Object.entries(document.time)
      .filter(([key]) => key !== 'created' && key !== 'modified')
      .map(([, value]) => new Date(value))
      .filter((date) => !Number.isNaN(date.getTime()))
      .sort((a, b) => a.getTime() - b.getTime());

    const downloads = await this.downloads(name);
    const firstRelease = releaseDates[0] ?? null;
    const lastRelease = releaseDates[releaseDates.length - 1] ?? null;
    const rating = scorePackage(
      {
        firstRelease,
        lastRelease,
        downloadsLastMonth: downloads,
        totalReleases: Object.keys(document.versions).length,
      },
      this.options.now?.() ?? new Date()
    );

    const author = typeof document.author === 'string' ? document.author : document.author?.name ?? null;
    return {
      safety_score: rating.score,
      safety_level: rating.level,
      safety_reasons: rating.reasons,
      version: document['dist-tags'].latest ?? null,
      author,
      downloads_last_month: downloads,
      first_release: firstRelease?.toISOString() ?? null,
      last_release: lastRelease?.toISOString() ?? null,
      total_releases: Object.keys(document.versions).length,
      description: document.description ?? null,
    };
  }

  private async downloads(name: string): Promise<number> {
    try {
      const response = await this.request(`${this.options.downloadsUrl.replace(/\/$/, '')}/${name}`);
      if (!response.ok) return 0;
      return DownloadsSchema.parse(await response.json()).downloads;
    } catch (error) {
      this.options.logger.debug('Download stats unavailable', { packageName: name, reason: errorMessage(error) });
      return 0;
    }
  }

  private async request(url: string): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        headers: { Accept: 'application/json', 'User-Agent': 'taskdeck-package-index' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new TransientError(`Registry unreachable: ${errorMessage(error)}`, error);
    }
  }
}
