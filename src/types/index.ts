// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  // Registry snapshot and matching options (both optional at start-up)
  REGISTRY_PATH?: string;
  MATCHING_CONFIG_PATH?: string;
  REPORTS_DIR: string;
  // Importer inputs for the batch run script
  BANK_STATEMENT_CSV?: string;
  STRIPE_CSV?: string;
  PAPER_RECEIPTS_CSV?: string;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}
