import { Router } from "express";
import { z } from "zod";
import type { QueryResponse, SearchResult, WireSearchResult } from "@docrag/types";
import { ValidationError } from "@docrag/errors";
import { search } from "@docrag/core";
import type { Services } from "../services.js";
import { asyncHandler } from "../middleware/async-handler.js";

export const MAX_QUERY_LIMIT = 10;

const queryParamsSchema = z.object({
  query: z.string().refine((q) => q.trim().length > 0, "Query must not be empty"),
  limit: z.coerce.number().int().min(1).max(MAX_QUERY_LIMIT).default(5),
});

export function toWireResult(result: SearchResult): WireSearchResult {
  return {
    text: result.text,
    document_name: result.documentName,
    chunk_id: result.chunkId,
    document_type: result.documentType,
    context_before: result.contextBefore,
    context_after: result.contextAfter,
    relevance_score: result.relevanceScore,
    distance: result.distance,
  };
}

export function createQueryRoutes(services: Services): Router {
  const router = Router();

  router.get(
    "/query",
    asyncHandler(async (req, res) => {
      const parsed = queryParamsSchema.safeParse(req.query);
      if (!parsed.success) {
        const fields: Record<string, string> = {};
        for (const issue of parsed.error.issues) {
          fields[issue.path.join(".")] = issue.message;
        }
        throw new ValidationError("Invalid query parameters", fields);
      }

      const results = await search(parsed.data, { vectorStore: services.vectorStore });

      const body: QueryResponse = {
        results: results.map(toWireResult),
        query: parsed.data.query,
      };
      res.json(body);
    }),
  );

  return router;
}
