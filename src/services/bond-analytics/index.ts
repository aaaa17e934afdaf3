export { BondAnalyticsService } from './bond-analytics-service.js';
export type { BondAnalyticsServiceDependencies } from './bond-analytics-service.js';
