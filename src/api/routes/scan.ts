import express, { Request, Response } from "express";
import { z } from "zod";
import { ArbOrchestrator } from "../../core/arb_orchestrator";
import { loadDefaultVenues } from "../../config/venues";
import { DecimalInputSchema, sendError } from "../errors";
import { opportunitiesDetected } from "../middleware/metrics";
import { rateLimit } from "../middleware/rateLimit";
import { State } from "../state";

const router = express.Router();

export const orchestrator = new ArbOrchestrator({ venues: loadDefaultVenues() });

const SnapshotSchema = z.object({
  venue: z.string().min(1),
  token0: z.string().min(1),
  token1: z.string().min(1),
  reserve0: DecimalInputSchema,
  reserve1: DecimalInputSchema,
  fee: DecimalInputSchema.optional(),
  poolAddress: z.string().optional(),
  blockNumber: z.number().int().nonnegative().optional(),
});

const ScanSchema = z.object({
  snapshots: z.array(SnapshotSchema).max(500),
  amountIn: DecimalInputSchema.optional(),
  gasCost: DecimalInputSchema.optional(),
  flashloan: z.object({
    provider: z.string().min(1).optional(),
    feeBps: DecimalInputSchema.optional(),
  }).optional(),
  optimize: z.object({
    maxInput: DecimalInputSchema,
    minInput: DecimalInputSchema.optional(),
    iterations: z.number().int().min(1).max(200).optional(),
  }).optional(),
});

router.post("/", rateLimit({ capacity: 20, refillPerMs: 250 }), (req: Request, res: Response) => {
  try {
    const { snapshots, ...options } = ScanSchema.parse(req.body ?? {});
    const opportunities = orchestrator.scan(snapshots, options);
    State.recordScan(opportunities);
    for (const o of opportunities) opportunitiesDetected.inc({ dex1: o.dex1, dex2: o.dex2 });
    res.json({ opportunities, count: opportunities.length });
  } catch (e) {
    sendError(res, e);
  }
});

export default router;
