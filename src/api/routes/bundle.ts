import express, { Request, Response } from "express";
import { z } from "zod";
import { buildBundle, TransactionBundle } from "../../bundle/builder";
import { hashLeaf, validateProof } from "../../bundle/merkle";
import { env } from "../../config/env";
import { sendError } from "../errors";
import { bundlesBuilt } from "../middleware/metrics";
import { State } from "../state";
import { orchestrator } from "./scan";

const router = express.Router();

const HashAlgorithmSchema = z.enum(["sha256", "keccak256", "sha512"]);

const BuildSchema = z.object({
  signedTxs: z.array(z.string().min(1)).min(1).max(256),
  name: z.string().min(1).optional(),
  opportunityId: z.string().min(1).optional(),
  hashAlgorithm: HashAlgorithmSchema.optional(),
});

// Either the raw leaf or its hash; proof shape is checked by validateProof itself
const VerifySchema = z.object({
  leaf: z.string().optional(),
  leafHash: z.string().optional(),
  proof: z.unknown(),
  root: z.string().min(1),
  hashAlgorithm: HashAlgorithmSchema.optional(),
}).refine((b) => b.leaf !== undefined || b.leafHash !== undefined, { message: "leaf or leafHash is required" });

router.post("/", (req: Request, res: Response) => {
  try {
    const body = BuildSchema.parse(req.body ?? {});
    let bundle: TransactionBundle;
    if (body.opportunityId) {
      const opportunity = State.findOpportunity(body.opportunityId);
      if (!opportunity) {
        res.status(404).json({ error: `unknown opportunity ${body.opportunityId}`, code: "not_found" });
        return;
      }
      bundle = orchestrator.buildBundle(opportunity, body.signedTxs);
    } else {
      bundle = buildBundle(body.signedTxs, { name: body.name, hashAlgorithm: body.hashAlgorithm });
    }
    State.recordBundle();
    bundlesBuilt.inc();
    res.status(201).json(bundle);
  } catch (e) {
    sendError(res, e);
  }
});

router.post("/verify", (req: Request, res: Response) => {
  try {
    const body = VerifySchema.parse(req.body ?? {});
    const algorithm = body.hashAlgorithm ?? env.MERKLE_HASH_ALGORITHM;
    const leafHash = body.leafHash ?? hashLeaf(body.leaf ?? "", algorithm);
    res.json({ valid: validateProof(body.proof, leafHash, body.root, algorithm) });
  } catch (e) {
    sendError(res, e);
  }
});

export default router;
