import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /health
 * @desc    Basic health check
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /health/ready
 * @desc    Readiness check (registry loaded)
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /health/live
 */
router.get('/live', healthController.getLiveness);

export default router;
