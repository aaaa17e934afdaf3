/**
 * Cash Flow Utilities - Barrel Export
 */

export {
  buildCashFlowSchedule,
  toCashFlowRows,
  getTotalCashFlows,
} from './cash-flow-schedule.js';
