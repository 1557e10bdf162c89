/**
 * Reconciliation Service
 *
 * Orchestrates a reconciliation run between the HTTP layer / run script
 * and the identity resolution engine:
 * - Resolving a batch against the active registry snapshot
 * - Post-review runs with reviewer-extracted PII
 * - Building and exporting run reports
 *
 * The engine itself is pure; this layer owns timing, logging and files.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { env } from '../config';
import { defaultMatchingConfig, type MatchingConfig } from '../config/matching';
import {
  IdentityResolver,
  PostReviewResolver,
  explainResult,
  summarize,
  type MatchResult,
  type PostReviewEntry,
  type ReconciliationSummary,
  type Transaction,
} from '../matching';
import { registryStore, type RegistryStore } from '../registry/registryStore';
import { Logging } from '../utils/logger';

// ============================================
// Types
// ============================================

export interface ReconciliationRunParams {
  platform: string;
  /** File path, upload name or endpoint the batch came from */
  sourceIdentifier: string;
  transactions: readonly Transaction[];
}

export interface PostReviewRunParams {
  platform: string;
  sourceIdentifier: string;
  entries: readonly PostReviewEntry[];
}

export interface ReconciliationReport extends ReconciliationSummary {
  runId: string;
  platform: string;
  runDate: string;
  sourceIdentifier: string;
  processingTimeMs: number;
  results: MatchResult[];
}

type Clock = () => Date;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `<platform>_<yyyyMMdd_HHmmss>` in UTC
 */
export function formatRunId(platform: string, date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${platform}_${day}_${time}`;
}

const percent = (ratio: number): string => `${(ratio * 100).toFixed(1)}%`;

// ============================================
// Service
// ============================================

export class ReconciliationService {
  private config: MatchingConfig;

  constructor(
    private readonly store: RegistryStore = registryStore,
    config: MatchingConfig = defaultMatchingConfig,
    private readonly clock: Clock = () => new Date()
  ) {
    this.config = config;
  }

  get matchingConfig(): MatchingConfig {
    return this.config;
  }

  /**
   * Replaces the matching options used by subsequent runs
   */
  useConfig(config: MatchingConfig): void {
    this.config = config;
  }

  /**
   * Resolves a batch against the active registry and builds its report.
   * Throws 503 when no registry has been loaded.
   */
  runReconciliation(params: ReconciliationRunParams): ReconciliationReport {
    const resolver = new IdentityResolver(this.store.current(), this.config);
    const runDate = this.clock();
    const started = Date.now();

    const results = resolver.resolveBatch(params.transactions);

    return this.buildReport(params.platform, params.sourceIdentifier, runDate, started, results);
  }

  /**
   * Re-resolves reviewed transactions using extracted PII, then propagates
   * matches across shared emails.
   */
  runPostReview(params: PostReviewRunParams): ReconciliationReport {
    const resolver = new PostReviewResolver(this.store.current(), this.config);
    const runDate = this.clock();
    const started = Date.now();

    const results = resolver.resolveBatch(params.entries);

    return this.buildReport(
      `${params.platform}_post_review`,
      params.sourceIdentifier,
      runDate,
      started,
      results
    );
  }

  /**
   * Writes `<runId>.json` into the reports directory and returns its path
   */
  async exportReport(report: ReconciliationReport, dir: string = env.REPORTS_DIR): Promise<string> {
    await mkdir(dir, { recursive: true });
    const path = join(dir, `${report.runId}.json`);
    await writeFile(path, JSON.stringify(report, null, 2), 'utf8');
    Logging.info(`Report written to ${path}`);
    return path;
  }

  private buildReport(
    platform: string,
    sourceIdentifier: string,
    runDate: Date,
    started: number,
    results: MatchResult[]
  ): ReconciliationReport {
    const processingTimeMs = Date.now() - started;
    const summary = summarize(results, this.config.confidenceThresholds);
    const report: ReconciliationReport = {
      runId: formatRunId(platform, runDate),
      platform,
      runDate: runDate.toISOString(),
      sourceIdentifier,
      processingTimeMs,
      ...summary,
      results,
    };

    this.logRun(report);
    return report;
  }

  private logRun(report: ReconciliationReport): void {
    const { high, medium, low } = report.confidenceDistribution;
    const seconds = report.processingTimeMs / 1000;
    const throughput =
      seconds > 0 ? `${Math.round(report.totalTransactions / seconds)} tx/s` : 'n/a';

    Logging.info(
      `Run ${report.runId}: ${report.matchedTransactions}/${report.totalTransactions} matched ` +
        `(${percent(report.matchRate)}), ${report.requiresReview} for review`
    );
    Logging.debug(`Confidence high=${high} medium=${medium} low=${low}`);
    Logging.debug({ methods: report.matchMethodBreakdown, processingTimeMs: report.processingTimeMs, throughput });

    for (const result of report.results) {
      if (result.requiresReview) {
        Logging.debug(`Review: ${explainResult(result, this.config.confidenceThresholds)}`);
      }
    }
  }
}

export const reconciliationService = new ReconciliationService();

export default reconciliationService;
