/**
 * Bond Analytics Services
 *
 * Fixed-income analytics for plain fixed-rate coupon bonds:
 * - Cash-flow schedules
 * - Price from yield, yield to maturity from price
 * - Accrued interest and clean/dirty prices
 * - Macaulay/modified duration and convexity
 * - Price-yield curve sweeps
 */

// Export shared types
export * from './shared/types/index.js';

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export services
export * from './services/bond-analytics/index.js';

// Export service types
export * from './services/types/index.js';

export const version = '0.1.0';
