/**
 * Bond Utilities - Barrel Export
 */

export { createBond, getPeriodCount, getPeriodCoupon } from './bond-factory.js';
