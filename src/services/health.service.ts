import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { registryStore, type RegistryStore } from '../registry/registryStore';

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor(private readonly store: RegistryStore = registryStore) {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Ready once a client registry snapshot is published
   */
  checkReadiness(): { ready: boolean; checks: Record<string, boolean> } {
    const checks: Record<string, boolean> = {
      server: true,
      registry: this.store.isLoaded(),
    };

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
