/**
 * Bond Analytics Service
 *
 * Facade between a presentation shell (form inputs, charts, tables) and the
 * pure calculation utilities. Each call re-derives every number from its
 * inputs; the service holds configuration only, never results.
 *
 * Errors from the calculation layer are logged and rethrown unchanged.
 * Nothing is retried.
 */

import type {
  Bond,
  BondInput,
  CashFlowSchedule,
  PriceChangeEstimate,
  PricingResult,
  YieldRange,
  YieldSolverConfig,
  YieldToMaturityResult,
} from '../../shared/types/index.js';
import type {
  AccrualInput,
  BondAnalyticsInput,
  BondAnalyticsResult,
  BondQuote,
} from '../types/bond-analytics/index.js';
import {
  DEFAULT_CURVE_RANGE,
  loadYieldSolverConfig,
  resolveYieldSolverConfig,
} from '../../config/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { createBond, getPeriodCoupon } from '../../utils/bond/index.js';
import {
  buildCashFlowSchedule,
  toCashFlowRows,
} from '../../utils/cash-flow/index.js';
import { InvalidPriceError } from '../../utils/errors/index.js';
import {
  assertValidYield,
  calculateAccrualFraction,
  calculateAccruedInterest,
  calculateCurrentYield,
  calculatePricingResult,
  calculateYieldToMaturity,
  toPeriodicYield,
} from '../../utils/pricing/index.js';
import {
  calculateRiskMetrics,
  estimatePriceChange,
  sweepPriceYieldCurve,
  yieldRange,
} from '../../utils/risk/index.js';

/**
 * Dependencies for BondAnalyticsService
 * All dependencies are optional and will use defaults if not provided
 */
export interface BondAnalyticsServiceDependencies {
  /**
   * Yield solver overrides
   * If not provided, overrides are read from YTM_SOLVER_* environment variables
   */
  solverConfig?: Partial<YieldSolverConfig>;

  /**
   * Annual-yield range for the price-yield curve
   * @default DEFAULT_CURVE_RANGE (1% to 15%, 100 points)
   */
  curveRange?: YieldRange;

  /**
   * Logger instance
   * If not provided, a service logger named 'BondAnalyticsService' is created
   */
  logger?: ServiceLogger;
}

/**
 * BondAnalyticsService
 *
 * Uses singleton pattern for convenient default access.
 */
export class BondAnalyticsService {
  private static instance: BondAnalyticsService | null = null;

  private readonly solverConfig: YieldSolverConfig;
  private readonly curveRange: YieldRange;
  protected readonly logger: ServiceLogger;

  /**
   * Creates a new BondAnalyticsService instance
   *
   * @throws InvalidSolverConfigError if the solver configuration is unusable
   */
  constructor(dependencies: BondAnalyticsServiceDependencies = {}) {
    this.solverConfig = resolveYieldSolverConfig(
      dependencies.solverConfig ?? loadYieldSolverConfig()
    );
    this.curveRange = dependencies.curveRange ?? DEFAULT_CURVE_RANGE;
    this.logger = dependencies.logger ?? createServiceLogger('BondAnalyticsService');
  }

  /**
   * Get singleton instance of BondAnalyticsService
   * Lazily creates instance on first access
   */
  static getInstance(): BondAnalyticsService {
    if (!BondAnalyticsService.instance) {
      BondAnalyticsService.instance = new BondAnalyticsService();
    }
    return BondAnalyticsService.instance;
  }

  /**
   * Reset singleton instance (useful for testing)
   */
  static resetInstance(): void {
    BondAnalyticsService.instance = null;
  }

  // ============================================================================
  // FULL ANALYSIS
  // ============================================================================

  /**
   * Derive schedule, yield, prices, risk metrics and the price-yield curve
   * from one set of inputs
   *
   * @throws InvalidBondError, InvalidRateError, InvalidPriceError,
   * YieldNotFoundError or InvalidAccrualError, unchanged from the calculation layer
   *
   * @example
   * ```typescript
   * const result = service.analyze({
   *   bond: { faceValue: 1000, couponRate: 0.05, yearsToMaturity: 10, frequency: 'Semi-annual' },
   *   quote: { type: 'price', marketPrice: 950 },
   * });
   * // result.yield.annualYield ≈ 0.056617
   * ```
   */
  analyze(input: BondAnalyticsInput): BondAnalyticsResult {
    log.methodEntry(this.logger, 'analyze', {
      bond: input.bond,
      quote: input.quote,
    });

    try {
      const bond = createBond(input.bond);
      const schedule = buildCashFlowSchedule(bond);
      const periodicPayment = getPeriodCoupon(bond);

      const fractionElapsed = this.resolveAccrualFraction(bond, input.accrual);
      const accruedInterest = calculateAccruedInterest(periodicPayment, fractionElapsed);

      const solvedYield = this.resolveYield(bond, schedule, input.quote, accruedInterest);
      const pricing = calculatePricingResult(
        schedule,
        solvedYield.yieldPerPeriod,
        accruedInterest
      );
      const risk = calculateRiskMetrics(schedule, solvedYield.yieldPerPeriod, bond.frequency);
      const curve = [
        ...sweepPriceYieldCurve(
          schedule,
          bond.frequency,
          yieldRange(input.curve ?? this.curveRange)
        ),
      ];

      const result: BondAnalyticsResult = {
        bond,
        schedule,
        cashFlowRows: toCashFlowRows(schedule),
        yield: solvedYield,
        pricing,
        risk,
        currentYield: calculateCurrentYield(bond, pricing.dirtyPrice),
        periodicPayment,
        totalPayments: schedule.length,
        curve,
      };

      log.methodExit(this.logger, 'analyze', {
        dirtyPrice: pricing.dirtyPrice,
        annualYield: solvedYield.annualYield,
        modifiedDuration: risk.modifiedDuration,
      });
      return result;
    } catch (error) {
      log.methodError(this.logger, 'analyze', toError(error), {
        bond: input.bond,
        quote: input.quote,
      });
      throw error;
    }
  }

  // ============================================================================
  // SINGLE CALCULATIONS
  // ============================================================================

  /**
   * Price a bond at an annual yield, valued on a coupon date
   *
   * @throws InvalidBondError if the bond parameters are invalid
   * @throws InvalidRateError if annualYield / frequency <= -1
   */
  priceFromYield(bondInput: BondInput, annualYield: number): PricingResult {
    log.methodEntry(this.logger, 'priceFromYield', { bond: bondInput, annualYield });

    try {
      const bond = createBond(bondInput);
      const schedule = buildCashFlowSchedule(bond);
      const pricing = calculatePricingResult(
        schedule,
        toPeriodicYield(annualYield, bond.frequency)
      );

      log.methodExit(this.logger, 'priceFromYield', { price: pricing.price });
      return pricing;
    } catch (error) {
      log.methodError(this.logger, 'priceFromYield', toError(error), { annualYield });
      throw error;
    }
  }

  /**
   * Solve the yield to maturity for a dirty market price
   *
   * @throws InvalidBondError if the bond parameters are invalid
   * @throws InvalidPriceError if marketPrice is not positive
   * @throws YieldNotFoundError if the solver finds no yield in its domain
   */
  yieldFromPrice(bondInput: BondInput, marketPrice: number): YieldToMaturityResult {
    log.methodEntry(this.logger, 'yieldFromPrice', { bond: bondInput, marketPrice });

    try {
      const bond = createBond(bondInput);
      const schedule = buildCashFlowSchedule(bond);
      const solved = this.solveYield(bond, schedule, marketPrice);

      log.methodExit(this.logger, 'yieldFromPrice', { annualYield: solved.annualYield });
      return solved;
    } catch (error) {
      log.methodError(this.logger, 'yieldFromPrice', toError(error), { marketPrice });
      throw error;
    }
  }

  /**
   * Duration/convexity estimate of the dirty-price move for a yield shock
   *
   * @param yieldChangeBps - Annual yield change in basis points
   */
  estimatePriceChange(
    result: BondAnalyticsResult,
    yieldChangeBps: number
  ): PriceChangeEstimate {
    return estimatePriceChange(result.pricing.dirtyPrice, result.risk, yieldChangeBps);
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private resolveYield(
    bond: Bond,
    schedule: CashFlowSchedule,
    quote: BondQuote,
    accruedInterest: number
  ): YieldToMaturityResult {
    if (quote.type === 'yield') {
      const yieldPerPeriod = toPeriodicYield(quote.annualYield, bond.frequency);
      assertValidYield(yieldPerPeriod);
      return {
        yieldPerPeriod,
        annualYield: quote.annualYield,
        iterations: 0,
      };
    }

    if (!Number.isFinite(quote.marketPrice) || quote.marketPrice <= 0) {
      throw new InvalidPriceError(quote.marketPrice);
    }

    const dirtyPrice =
      quote.priceType === 'clean' ? quote.marketPrice + accruedInterest : quote.marketPrice;
    return this.solveYield(bond, schedule, dirtyPrice);
  }

  private solveYield(
    bond: Bond,
    schedule: CashFlowSchedule,
    dirtyPrice: number
  ): YieldToMaturityResult {
    const solved = calculateYieldToMaturity(
      schedule,
      dirtyPrice,
      bond.frequency,
      this.solverConfig
    );

    log.calculation(this.logger, 'yieldToMaturity', {
      dirtyPrice,
      iterations: solved.iterations,
      annualYield: solved.annualYield,
    });
    return solved;
  }

  private resolveAccrualFraction(bond: Bond, accrual: AccrualInput | undefined): number {
    if (accrual === undefined) {
      return 0;
    }
    if ('fractionElapsed' in accrual) {
      return accrual.fractionElapsed;
    }
    return calculateAccrualFraction(
      accrual.lastPaymentDate,
      accrual.settlementDate,
      bond.frequency,
      accrual.dayCount
    );
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
