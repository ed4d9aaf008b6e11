import express, { Request, Response } from "express";
import { z } from "zod";
import quoteRouter from "./routes/quote";
import scanRouter from "./routes/scan";
import bundleRouter from "./routes/bundle";
import venuesRouter from "./routes/venues";
import configRouter from "./routes/config";
import { loggingMiddleware } from "./middleware/logging";
import { metricsMiddleware, register } from "./middleware/metrics";
import { State } from "./state";

export const app = express();
app.use(express.json({ limit: "1mb" }));
app.use(loggingMiddleware);
app.use(metricsMiddleware);

app.get("/health", (_req: Request, res: Response) => res.json({ ok: true }));
app.get("/metrics", async (_req: Request, res: Response) => {
  res.setHeader("Content-Type", register.contentType);
  res.end(await register.metrics());
});

app.use("/api/quote", quoteRouter);
app.use("/api/scan", scanRouter);
app.use("/api/bundle", bundleRouter);
app.use("/api/venues", venuesRouter);
app.use("/api/config", configRouter);

// Read-only endpoints for reporting
app.get("/api/stats", (_req: Request, res: Response) => {
  res.json(State.getStats());
});

app.get("/api/opportunities/recent", (req: Request, res: Response) => {
  const limitSchema = z.coerce.number().int().min(1).max(200).default(50);
  const parse = limitSchema.safeParse(req.query.limit);
  const limit = parse.success ? parse.data : 50;
  res.json(State.getRecentOpportunities(limit));
});
