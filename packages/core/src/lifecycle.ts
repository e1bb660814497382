import { withRetry, type RetryOptions } from "@docrag/errors";
import { withSession, type IVectorStore } from "@docrag/vector-store";
import type { Logger } from "@docrag/logger";

export interface StoreDependencies {
  vectorStore: IVectorStore;
  logger: Logger;
}

const INITIALIZE_RETRY: RetryOptions = {
  maxRetries: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

// Startup waits out an unreachable store and fails on any other error.
const INITIALIZE_RETRYABLE = ["STORE_UNAVAILABLE"];

/** Creates the collection if it is missing. Retries while the store is unreachable. */
export async function initialize(
  deps: StoreDependencies,
  retry: RetryOptions = INITIALIZE_RETRY,
): Promise<void> {
  await withRetry(() => withSession(deps.vectorStore, (session) => session.ensureCollection()), {
    ...retry,
    retryableErrors: INITIALIZE_RETRYABLE,
    onRetry: (attempt, delayMs, error) => {
      deps.logger.warn({ attempt, delayMs, err: error }, "Vector store not ready, retrying");
    },
  });
  deps.logger.info({ collection: deps.vectorStore.collectionName }, "Vector store ready");
}

/** Drops the collection and recreates it empty. */
export async function deleteAll(deps: StoreDependencies): Promise<void> {
  await withSession(deps.vectorStore, async (session) => {
    await session.deleteCollection();
    await session.ensureCollection();
  });
  deps.logger.info({ collection: deps.vectorStore.collectionName }, "All documents deleted");
}

export async function deleteDocument(documentName: string, deps: StoreDependencies): Promise<void> {
  await withSession(deps.vectorStore, (session) => session.deleteByDocumentName(documentName));
  deps.logger.info({ documentName }, "Document deleted");
}
