import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { fetchGeneInfoBatch, resolveGeneSymbols } from "./genes/batch";
import type { GeneInfoClient, GeneQueryClient } from "./genes/types";

export const ResolveRequestSchema = z.object({
  symbols: z.array(z.string().trim().min(1)).min(1).max(500)
});

export const GeneInfoRequestSchema = z.object({
  genes: z.record(z.string().regex(/^\d+$/, "gene ids are numeric"))
});

export interface RouteDependencies {
  client: GeneQueryClient & GeneInfoClient;
  concurrency: number;
}

export function createRoutes({ client, concurrency }: RouteDependencies): Router {
  const router = Router();

  router.post("/resolve", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = ResolveRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: "Request body must include a non-empty symbols array." });
    }

    try {
      const report = await resolveGeneSymbols(parsed.data.symbols, client, { concurrency });
      return res.json(report);
    } catch (error) {
      return next(error);
    }
  });

  router.post("/genes/info", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = GeneInfoRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: "Request body must map gene symbols to numeric gene ids." });
    }

    try {
      const report = await fetchGeneInfoBatch(parsed.data.genes, client, { concurrency });
      return res.json(report);
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
