import { Router, Request, Response } from 'express';
import { env } from '../../config/env';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  res.json({
    profitability: {
      minProfitThreshold: env.MIN_PROFIT_THRESHOLD,
      defaultPoolFee: env.DEFAULT_POOL_FEE,
      defaultTradeSize: env.DEFAULT_TRADE_SIZE,
      defaultGasCost: env.DEFAULT_GAS_COST,
      flashloanFeeBps: env.FLASHLOAN_FEE_BPS,
    },
    optimizer: {
      minInput: env.OPTIMIZER_MIN_INPUT,
      iterations: env.OPTIMIZER_ITERATIONS,
    },
    bundles: {
      hashAlgorithm: env.MERKLE_HASH_ALGORITHM,
      relayCount: env.RELAY_URLS.length,
    },
    // Safe exposure only; relay URLs may embed credentials
    updatedAt: Date.now(),
  });
});

export default router;
