import { Router } from "express";
import type { HealthResponse } from "@docrag/types";
import type { Services } from "../services.js";
import { asyncHandler } from "../middleware/async-handler.js";

export function createHealthRoutes(services: Services): Router {
  const router = Router();

  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const healthy = await services.vectorStore.healthCheck();
      const body: HealthResponse = { status: healthy ? "ok" : "unavailable" };
      res.status(healthy ? 200 : 503).json(body);
    }),
  );

  return router;
}
