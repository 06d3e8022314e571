/**
 * order-desk Global Configuration
 */

import { z } from 'zod';
import type { LogLevel } from './logging/logger.js';
import type { LogFormatter } from './logging/formatters/types.js';
import { JsonFormatter } from './logging/formatters/json.js';
import { LineFormatter } from './logging/formatters/line.js';
import type { StepMiddleware } from './workflow/step.js';

/**
 * Bulk discount tier. A tier applies when the request's total units reach `minUnits`.
 */
export interface DiscountTier {
  minUnits: number;
  rate: number;
}

/**
 * Supplier lead time. Applies to orders of at most `maxUnits` units.
 */
export interface LeadTime {
  maxUnits: number;
  days: number;
}

/**
 * Global configuration options
 */
export interface OrderDeskConfiguration {
  /** Fraction of the cash balance that must remain after any purchase */
  safetyMargin: number;

  /** Restock target as a multiple of the item's minimum stock level */
  restockMultiplier: number;

  discountTiers: DiscountTier[];
  leadTimes: LeadTime[];

  // Logging
  logger: {
    output?: NodeJS.WritableStream;
    formatter?: LogFormatter;
    progname?: string;
    level?: LogLevel;
    enabled?: boolean;
  };

  // Registries
  middlewares: MiddlewareRegistry;
}

/**
 * Step middleware registry
 */
export class MiddlewareRegistry {
  private _middlewares: StepMiddleware[] = [];

  get registry(): readonly StepMiddleware[] {
    return this._middlewares;
  }

  register(middleware: StepMiddleware): void {
    this._middlewares.push(middleware);
  }

  deregister(middleware: StepMiddleware): boolean {
    const index = this._middlewares.indexOf(middleware);
    if (index !== -1) {
      this._middlewares.splice(index, 1);
      return true;
    }
    return false;
  }

  clear(): void {
    this._middlewares = [];
  }
}

export const DEFAULT_DISCOUNT_TIERS: readonly DiscountTier[] = [
  { minUnits: 0, rate: 0 },
  { minUnits: 501, rate: 0.1 },
  { minUnits: 1001, rate: 0.15 },
];

export const DEFAULT_LEAD_TIMES: readonly LeadTime[] = [
  { maxUnits: 10, days: 0 },
  { maxUnits: 100, days: 1 },
  { maxUnits: 1000, days: 4 },
  { maxUnits: Number.POSITIVE_INFINITY, days: 7 },
];

/**
 * Default configuration
 */
export function createDefaultConfiguration(): OrderDeskConfiguration {
  return {
    safetyMargin: 0.2,
    restockMultiplier: 2,
    discountTiers: DEFAULT_DISCOUNT_TIERS.map((tier) => ({ ...tier })),
    leadTimes: DEFAULT_LEAD_TIMES.map((lead) => ({ ...lead })),
    logger: {
      progname: 'order-desk',
      level: 'info',
      enabled: true,
    },
    middlewares: new MiddlewareRegistry(),
  };
}

/**
 * Global configuration instance
 */
let configuration: OrderDeskConfiguration = createDefaultConfiguration();

/**
 * Get the current configuration
 */
export function getConfiguration(): OrderDeskConfiguration {
  return configuration;
}

/**
 * Configure order-desk globally
 */
export function configure(
  fn: (config: OrderDeskConfiguration) => void
): void {
  fn(configuration);
}

/**
 * Reset configuration to defaults
 */
export function resetConfiguration(): void {
  configuration = createDefaultConfiguration();
}

// ============================================
// Environment
// ============================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  ORDER_DESK_SAFETY_MARGIN: z.coerce.number().min(0).max(1).optional(),
  ORDER_DESK_RESTOCK_MULTIPLIER: z.coerce.number().min(1).optional(),
  ORDER_DESK_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  ORDER_DESK_LOG_FORMAT: z.enum(['line', 'json']).optional(),
  ORDER_DESK_LOG_ENABLED: booleanFlag.optional(),
});

export type OrderDeskEnv = z.infer<typeof EnvSchema>;

/**
 * Read configuration overrides from environment variables.
 * Throws a ZodError naming the offending variable when a value is malformed.
 */
export function configurationFromEnv(
  env: Record<string, string | undefined> = process.env
): OrderDeskEnv {
  return EnvSchema.parse(env);
}

/**
 * Apply environment overrides on top of a configuration
 */
export function applyEnv(
  config: OrderDeskConfiguration,
  env: OrderDeskEnv
): OrderDeskConfiguration {
  if (env.ORDER_DESK_SAFETY_MARGIN !== undefined) {
    config.safetyMargin = env.ORDER_DESK_SAFETY_MARGIN;
  }
  if (env.ORDER_DESK_RESTOCK_MULTIPLIER !== undefined) {
    config.restockMultiplier = env.ORDER_DESK_RESTOCK_MULTIPLIER;
  }
  if (env.ORDER_DESK_LOG_LEVEL !== undefined) {
    config.logger.level = env.ORDER_DESK_LOG_LEVEL;
  }
  if (env.ORDER_DESK_LOG_FORMAT !== undefined) {
    config.logger.formatter =
      env.ORDER_DESK_LOG_FORMAT === 'json' ? new JsonFormatter() : new LineFormatter();
  }
  if (env.ORDER_DESK_LOG_ENABLED !== undefined) {
    config.logger.enabled = env.ORDER_DESK_LOG_ENABLED;
  }
  return config;
}
