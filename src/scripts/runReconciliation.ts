/**
 * Batch reconciliation run
 *
 * Loads the matching options and client registry, imports every configured
 * CSV source, resolves each one and writes a report per source.
 *
 * Usage:
 *   REGISTRY_PATH=clients.json BANK_STATEMENT_CSV=statement.csv npm run reconcile
 */

import { env, loadMatchingConfig } from '../config';
import { getImporter, importTransactions } from '../importers';
import { registryStore } from '../registry';
import { reconciliationService, type ReconciliationReport } from '../services';
import { Logging } from '../utils';

// ============================================
// Configuration
// ============================================

const SOURCES: ReadonlyArray<{ platform: string; path: string | undefined }> = [
  { platform: 'bank_statement', path: env.BANK_STATEMENT_CSV },
  { platform: 'stripe', path: env.STRIPE_CSV },
  { platform: 'paper_receipt', path: env.PAPER_RECEIPTS_CSV },
];

const percent = (ratio: number): string => `${(ratio * 100).toFixed(1)}%`;

const summaryLine = (label: string, matched: number, total: number, review: number): string =>
  `${label.padEnd(16)} ${String(matched).padStart(6)} / ${String(total).padEnd(6)} ` +
  `${percent(total > 0 ? matched / total : 0).padStart(7)}  review ${review}`;

// ============================================
// Run
// ============================================

async function reconcileSource(platform: string, path: string): Promise<ReconciliationReport> {
  const importer = getImporter(platform);
  if (!importer) {
    throw new Error(`No importer registered for ${platform}`);
  }

  const imported = await importTransactions(importer, path);
  Logging.info(
    `${platform}: imported ${imported.stats.valid} of ${imported.stats.total} rows from ${path}`
  );

  const report = reconciliationService.runReconciliation({
    platform,
    sourceIdentifier: path,
    transactions: imported.transactions,
  });
  await reconciliationService.exportReport(report);

  return report;
}

async function main(): Promise<void> {
  if (!env.REGISTRY_PATH) {
    throw new Error('REGISTRY_PATH must point at a client registry JSON file');
  }

  reconciliationService.useConfig(await loadMatchingConfig(env.MATCHING_CONFIG_PATH));
  const registry = await registryStore.load(env.REGISTRY_PATH);
  Logging.info(`Loaded ${registry.size} clients from ${env.REGISTRY_PATH}`);

  const configured = SOURCES.flatMap(({ platform, path }) => (path ? [{ platform, path }] : []));
  if (configured.length === 0) {
    Logging.warn('No sources configured (BANK_STATEMENT_CSV, STRIPE_CSV, PAPER_RECEIPTS_CSV)');
    return;
  }

  const reports: ReconciliationReport[] = [];
  for (const { platform, path } of configured) {
    reports.push(await reconcileSource(platform, path));
  }

  const totals = reports.reduce(
    (acc, report) => ({
      matched: acc.matched + report.matchedTransactions,
      total: acc.total + report.totalTransactions,
      review: acc.review + report.requiresReview,
    }),
    { matched: 0, total: 0, review: 0 }
  );

  Logging.box(
    'RECONCILIATION SUMMARY',
    ...reports.map((report) =>
      summaryLine(
        report.platform,
        report.matchedTransactions,
        report.totalTransactions,
        report.requiresReview
      )
    ),
    summaryLine('overall', totals.matched, totals.total, totals.review)
  );
}

main()
  .then(() => {
    Logging.success('Reconciliation run complete');
  })
  .catch((error: unknown) => {
    Logging.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
