import { Request, Response } from "express";
import { StatsService } from "../services/statsService";
import { errorMeta, logger } from "../services/logger";

export function createStatsHandlers(stats: StatsService) {
  /**
   * GET /api/stats
   */
  async function getStatsHandler(req: Request, res: Response): Promise<void> {
    try {
      res.json(await stats.get());
    } catch (err) {
      logger.error("Failed to get stats", errorMeta(err));
      res.status(500).json({ error: "Failed to get stats" });
    }
  }

  return { getStatsHandler };
}
