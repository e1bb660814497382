import express, { type Express } from "express";
import cors from "cors";
import { NotFoundError } from "@docrag/errors";
import type { Services } from "./services.js";
import { createRequestContext } from "./middleware/request-context.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { createDocumentRoutes } from "./routes/documents.js";
import { createQueryRoutes } from "./routes/query.js";
import { createHealthRoutes } from "./routes/health.js";

export type { Services } from "./services.js";
export { createServices } from "./container.js";

export function createApp(services: Services): Express {
  const app = express();
  const { origins } = services.config.cors;

  app.disable("x-powered-by");
  app.use(cors({ origin: origins === "*" ? "*" : origins }));
  app.use(createRequestContext(services.logger));

  app.use(createDocumentRoutes(services));
  app.use(createQueryRoutes(services));
  app.use(createHealthRoutes(services));

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });
  app.use(createErrorHandler(services.logger));

  return app;
}
