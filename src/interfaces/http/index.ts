export { default as registryPlugin } from './registry-plugin.js';
export type { RegistryPluginOptions } from './registry-plugin.js';
export { default as admissionPlugin } from './admission-plugin.js';
export { default as keyRoutes } from './key-routes.js';
export { default as listingRoutes } from './listing-routes.js';
export { default as webhookRoutes } from './webhook-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { default as exemptionRoutes } from './exemption-routes.js';
export { default as systemRoutes } from './system-routes.js';
