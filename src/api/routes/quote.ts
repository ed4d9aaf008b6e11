import express, { Request, Response } from "express";
import { z } from "zod";
import { quoteSwap } from "../../eval/arb_math";
import { env } from "../../config/env";
import { DecimalInputSchema, sendError } from "../errors";

const router = express.Router();

const QuoteSchema = z.object({
  amountIn: DecimalInputSchema,
  reserveIn: DecimalInputSchema,
  reserveOut: DecimalInputSchema,
  fee: DecimalInputSchema.optional(),
});

router.post("/", (req: Request, res: Response) => {
  try {
    const body = QuoteSchema.parse(req.body ?? {});
    const quote = quoteSwap(body.amountIn, body, env.DEFAULT_POOL_FEE);
    res.json(quote);
  } catch (e) {
    sendError(res, e);
  }
});

export default router;
