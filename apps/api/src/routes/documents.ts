import { Router } from "express";
import multer from "multer";
import type { DeleteResponse, UploadResponse } from "@docrag/types";
import { ValidationError } from "@docrag/errors";
import { documentTypeFromFilename } from "@docrag/extractor";
import { deleteAll, deleteDocument, ingest } from "@docrag/core";
import type { Services } from "../services.js";
import { asyncHandler } from "../middleware/async-handler.js";
import { requestLogger } from "../middleware/request-context.js";

export function createDocumentRoutes(services: Services): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    // filenames are document names; decode them as UTF-8, not latin1
    defParamCharset: "utf8",
    limits: { fileSize: services.config.upload.maxBytes, files: 1 },
  });

  router.post(
    "/upload",
    upload.single("file"),
    asyncHandler(async (req, res) => {
      const name = req.file?.originalname;
      if (!req.file || !name) {
        throw new ValidationError("File does not have a valid filename", { file: "required" });
      }

      const declaredType = documentTypeFromFilename(name);
      const result = await ingest(
        { name, declaredType, bytes: req.file.buffer },
        {
          extractors: services.extractors,
          chunker: services.chunker,
          chunking: services.config.chunking,
          vectorStore: services.vectorStore,
          logger: requestLogger(req, services.logger),
        },
      );

      const body: UploadResponse = {
        success: true,
        message: `Document '${name}' processed successfully`,
        chunks: result.chunkCount,
      };
      res.json(body);
    }),
  );

  router.delete(
    "/delete",
    asyncHandler(async (req, res) => {
      await deleteAll({
        vectorStore: services.vectorStore,
        logger: requestLogger(req, services.logger),
      });

      const body: DeleteResponse = { message: "All documents deleted successfully" };
      res.json(body);
    }),
  );

  router.delete(
    "/documents/:name",
    asyncHandler(async (req, res) => {
      const name = req.params["name"] ?? "";
      await deleteDocument(name, {
        vectorStore: services.vectorStore,
        logger: requestLogger(req, services.logger),
      });

      const body: DeleteResponse = { message: `Document '${name}' deleted successfully` };
      res.json(body);
    }),
  );

  return router;
}
