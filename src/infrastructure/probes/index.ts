export { HealthChecker } from './health-checker.js';
export type { HealthCheckerOptions } from './health-checker.js';
