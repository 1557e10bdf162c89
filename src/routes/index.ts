import { Router } from 'express';
import healthRoutes from './health.routes';
import registryRoutes from './registry.routes';
import reconciliationRoutes from './reconciliation.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Client registry (stats, lookup, reload)
router.use('/registry', registryRoutes);

// Reconciliation runs (JSON batches, CSV upload, post-review)
router.use('/reconciliation', reconciliationRoutes);

export default router;
