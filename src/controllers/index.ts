export { healthController, HealthController } from './health.controller';
export { registryController, RegistryController } from './registry.controller';
