import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ChainSchema, getEnabledVenues, getVenueStatistics, loadDefaultVenues } from '../../config/venues';
import { sendError } from '../errors';

const router = Router();
const registry = loadDefaultVenues();

const QuerySchema = z.object({
  chain: ChainSchema.optional(),
  minPriority: z.coerce.number().int().min(0).optional(),
  maxSources: z.coerce.number().int().min(1).max(100).optional(),
});

router.get('/', (req: Request, res: Response) => {
  try {
    const filter = QuerySchema.parse(req.query);
    res.json({
      venues: getEnabledVenues(registry, filter),
      stats: getVenueStatistics(registry),
    });
  } catch (e) {
    sendError(res, e);
  }
});

export default router;
