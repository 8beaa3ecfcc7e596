export { loadRegistryConfig, DEFAULT_CONFIG, ConfigError } from './registry-config.js';
export type { RegistryConfig, StoreConfig, RateLimitConfig } from './registry-config.js';
