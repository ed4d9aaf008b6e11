/**
 * Environment configuration with validation
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

// Money values stay strings so they reach decimal.js without a float round-trip
const decimalString = (fallback: string) =>
  z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'expected a decimal number').default(fallback);

const csv = z
  .string()
  .optional()
  .transform((raw) => (raw ?? '').split(',').map((s) => s.trim()).filter((s) => s.length > 0));

// Environment schema
const envSchema = z.object({
  // Profitability
  MIN_PROFIT_THRESHOLD: decimalString('0.001'),
  DEFAULT_POOL_FEE: decimalString('0.003'),
  DEFAULT_TRADE_SIZE: decimalString('1000'),
  DEFAULT_GAS_COST: decimalString('0'),
  FLASHLOAN_FEE_BPS: decimalString('9'),

  // Optimizer
  OPTIMIZER_MIN_INPUT: decimalString('0.001'),
  OPTIMIZER_ITERATIONS: z.coerce.number().int().min(1).max(500).default(60),

  // Bundles
  MERKLE_HASH_ALGORITHM: z.enum(['sha256', 'keccak256', 'sha512']).default('sha256'),
  RELAY_URLS: csv,

  // Operational
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // API Configuration
  TS_API_PORT: z.coerce.number().int().min(1).max(65535).default(8082),
});

// Parse and validate environment
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment variables:');
      error.errors.forEach(err => {
        console.error(`  ${err.path.join('.')}: ${err.message}`);
      });
      process.exit(1);
    }
    throw error;
  }
};

// Export validated config
export const env = parseEnv();

// Export type for use in other modules
export type Env = z.infer<typeof envSchema>;
