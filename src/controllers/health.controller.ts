import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   */
  getHealth = (_req: Request, res: Response): void => {
    sendSuccess(res, healthService.getHealthStatus(), 'Service is healthy');
  };

  /**
   * GET /health/ready
   * Ready once the client registry has been loaded
   */
  getReadiness = (_req: Request, res: Response): void => {
    const { ready, checks } = healthService.checkReadiness();

    if (ready) {
      sendSuccess(res, { ready, checks }, 'Service is ready');
    } else {
      sendError(res, 'Service is not ready', 503, JSON.stringify(checks));
    }
  };

  /**
   * GET /health/live
   */
  getLiveness = (_req: Request, res: Response): void => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  };
}

export const healthController = new HealthController();

export default healthController;
