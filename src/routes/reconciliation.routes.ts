/**
 * Reconciliation API Routes
 *
 * Endpoints:
 * - POST /resolve     - Resolve a JSON batch of transactions
 * - POST /upload      - Import a platform CSV export and resolve it
 * - POST /post-review - Re-resolve reviewed transactions with extracted PII
 *
 * Runs are synchronous: the response carries the full report.
 */

import { Router, Request, Response } from 'express';
import multer from 'multer';
import { Readable } from 'stream';
import { AppError, Logging, sendSuccess, asyncHandler } from '../utils';
import { validateRequest } from '../middlewares';
import { getImporter, importTransactions, SUPPORTED_PLATFORMS } from '../importers';
import { reconciliationService } from '../services';
import {
  postReviewBodySchema,
  resolveBodySchema,
  toPostReviewEntry,
  toTransaction,
  type PostReviewBody,
  type ResolveBody,
} from '../validators/reconciliation.validator';

const router = Router();

// ============================================
// Multer Configuration
// ============================================

/**
 * File filter to only accept CSV files
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const allowedMimeTypes = ['text/csv', 'application/csv', 'text/plain'];

  const mimeTypeOk = allowedMimeTypes.includes(file.mimetype);
  const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

  if (mimeTypeOk || extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.badRequest('Only CSV files are allowed'));
  }
};

/**
 * Uploads stay in memory and are streamed straight into the importer
 */
const upload = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: 10 * 1024 * 1024, // 10MB max
  },
});

// ============================================
// Routes
// ============================================

/**
 * @route   POST /reconciliation/resolve
 * @desc    Resolve transactions against the active client registry
 *
 * Body: { platform?: string, transactions: [{ transaction_id, date, amount, description, ... }] }
 */
router.post(
  '/resolve',
  validateRequest({ body: resolveBodySchema }),
  (req: Request, res: Response): void => {
    const body: ResolveBody = req.body;
    const transactions = body.transactions.map((tx) => toTransaction(tx, body.platform));

    const report = reconciliationService.runReconciliation({
      platform: body.platform,
      sourceIdentifier: 'api',
      transactions,
    });

    sendSuccess(res, report, `Resolved ${report.totalTransactions} transactions`);
  }
);

/**
 * @route   POST /reconciliation/upload?platform=bank_statement|stripe|paper_receipt
 * @desc    Import a CSV export (multipart field "file") and resolve it
 */
router.post(
  '/upload',
  upload.single('file'),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { platform } = req.query;
    const importer = typeof platform === 'string' ? getImporter(platform) : undefined;
    if (!importer) {
      throw AppError.badRequest(`platform must be one of: ${SUPPORTED_PLATFORMS.join(', ')}`);
    }

    if (!req.file) {
      throw AppError.badRequest('No file uploaded. Please upload a CSV file.');
    }

    const { originalname, size, buffer } = req.file;
    Logging.info(`CSV upload received: ${originalname} (${(size / 1024).toFixed(2)} KB)`);

    const imported = await importTransactions(importer, Readable.from(buffer));
    const report = reconciliationService.runReconciliation({
      platform: importer.platform,
      sourceIdentifier: originalname,
      transactions: imported.transactions,
    });

    sendSuccess(
      res,
      { ...report, importErrors: imported.errors, importStats: imported.stats },
      `Imported ${imported.stats.valid} of ${imported.stats.total} rows`
    );
  })
);

/**
 * @route   POST /reconciliation/post-review
 * @desc    Resolve reviewed transactions with extracted PII, then propagate by email
 *
 * Body: { platform?: string, transactions: [{ ..., previously_matched?, pii: { name, address, business_number, phone, email } }] }
 */
router.post(
  '/post-review',
  validateRequest({ body: postReviewBodySchema }),
  (req: Request, res: Response): void => {
    const body: PostReviewBody = req.body;

    const report = reconciliationService.runPostReview({
      platform: body.platform,
      sourceIdentifier: 'api',
      entries: body.transactions.map((tx) => toPostReviewEntry(tx, body.platform)),
    });

    sendSuccess(res, report, `Post-review resolved ${report.matchedTransactions} transactions`);
  }
);

export default router;
