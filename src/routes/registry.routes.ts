import { Router } from 'express';
import { registryController } from '../controllers';

const router = Router();

/**
 * @route   GET /registry
 * @desc    Snapshot metadata and index sizes
 */
router.get('/', registryController.getStats);

/**
 * @route   GET /registry/clients/:clientId
 * @desc    One client record, 404 when unknown
 */
router.get('/clients/:clientId', registryController.getClient);

/**
 * @route   POST /registry/reload
 * @desc    Rebuild the snapshot from REGISTRY_PATH
 */
router.post('/reload', registryController.reload);

export default router;
