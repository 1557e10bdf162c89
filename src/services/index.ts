export { healthService, HealthService } from './health.service';
export { reconciliationService } from './reconciliation.service';
export * from './reconciliation.service';
