import { Request, Response } from 'express';
import { env } from '../config';
import { registryStore, type RegistryStore } from '../registry/registryStore';
import { AppError, asyncHandler, sendSuccess } from '../utils';

/**
 * Client registry inspection and reload
 */
export class RegistryController {
  constructor(
    private readonly store: RegistryStore = registryStore,
    private readonly registryPath: () => string | undefined = () => env.REGISTRY_PATH
  ) {}

  /**
   * GET /registry
   */
  getStats = (_req: Request, res: Response): void => {
    const registry = this.store.current();
    sendSuccess(
      res,
      {
        metadata: registry.metadata,
        loadedAt: registry.loadedAt.toISOString(),
        stats: registry.stats(),
      },
      'Registry statistics retrieved'
    );
  };

  /**
   * GET /registry/clients/:clientId
   */
  getClient = (req: Request, res: Response): void => {
    const { clientId } = req.params;
    const client = this.store.current().getClient(clientId);

    if (!client) {
      throw AppError.notFound(`Client ${clientId} not found`);
    }

    sendSuccess(res, client, 'Client retrieved');
  };

  /**
   * POST /registry/reload
   * Rebuilds the snapshot from REGISTRY_PATH; the old one stays active on failure
   */
  reload = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const path = this.registryPath();
    if (!path) {
      throw AppError.badRequest('REGISTRY_PATH is not configured');
    }

    const registry = await this.store.reload(path);
    sendSuccess(res, registry.stats(), `Registry reloaded from ${path}`);
  });
}

export const registryController = new RegistryController();

export default registryController;
