import { randomUUID } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import type { BatchInsertFailure, BatchInsertResult, DocumentRecord } from "@docrag/types";
import type { IEmbeddingProvider } from "@docrag/embeddings";
import { AppError, StoreUnavailableError, errorMessage } from "@docrag/errors";
import type {
  IVectorStore,
  VectorSearchResult,
  VectorStoreSession,
} from "./vector-store.interface.js";
import { searchPayloadSchema, toPayload } from "./payload.js";
import { scoreFromSimilarity } from "./similarity.js";

const BATCH_SIZE = 100;

export type QdrantClientLike = Pick<
  QdrantClient,
  | "getCollections"
  | "createCollection"
  | "deleteCollection"
  | "createPayloadIndex"
  | "upsert"
  | "delete"
  | "search"
>;

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  collectionName: string;
  embedder: IEmbeddingProvider;
  createClient?: (options: { url: string; apiKey?: string }) => QdrantClientLike;
}

async function storeCall<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (AppError.isAppError(err)) throw err;
    throw new StoreUnavailableError(`Vector store ${action} failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Qdrant-backed store. Vectors are computed by the embedding provider on
 * write and query; the collection uses cosine distance.
 */
export class QdrantVectorStore implements IVectorStore {
  readonly collectionName: string;
  private url: string;
  private apiKey: string | undefined;
  private embedder: IEmbeddingProvider;
  private createClient: (options: { url: string; apiKey?: string }) => QdrantClientLike;

  constructor(options: QdrantVectorStoreOptions) {
    this.url = options.url;
    this.apiKey = options.apiKey;
    this.collectionName = options.collectionName;
    this.embedder = options.embedder;
    this.createClient = options.createClient ?? ((opts) => new QdrantClient(opts));
  }

  async connect(): Promise<VectorStoreSession> {
    const client = this.createClient({ url: this.url, apiKey: this.apiKey });
    try {
      await client.getCollections();
    } catch (err) {
      throw new StoreUnavailableError(`Cannot connect to Qdrant at ${this.url}`, { cause: err });
    }
    return new QdrantSession(client, this.collectionName, this.embedder);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const session = await this.connect();
      await session.close();
      return true;
    } catch {
      return false;
    }
  }
}

class QdrantSession implements VectorStoreSession {
  private closed = false;

  constructor(
    private client: QdrantClientLike,
    private collectionName: string,
    private embedder: IEmbeddingProvider,
  ) {}

  async ensureCollection(): Promise<void> {
    this.assertOpen();
    if (await this.collectionExists()) return;

    await storeCall("create collection", async () => {
      await this.client.createCollection(this.collectionName, {
        vectors: {
          size: this.embedder.dimensions,
          distance: "Cosine",
        },
      });
      await this.client.createPayloadIndex(this.collectionName, {
        field_name: "document_name",
        field_schema: "keyword",
        wait: true,
      });
    });
  }

  async deleteCollection(): Promise<void> {
    this.assertOpen();
    if (!(await this.collectionExists())) return;

    await storeCall("delete collection", () => this.client.deleteCollection(this.collectionName));
  }

  async insertBatch(records: DocumentRecord[]): Promise<BatchInsertResult> {
    this.assertOpen();
    let inserted = 0;
    const failed: BatchInsertFailure[] = [];

    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);
      try {
        const { embeddings } = await this.embedder.batchEmbed(
          batch.map((r) => r.text),
          "search_document",
        );
        await this.client.upsert(this.collectionName, {
          wait: true,
          points: batch.map((record, j) => ({
            id: randomUUID(),
            vector: embeddings[j] ?? [],
            payload: toPayload(record),
          })),
        });
        inserted += batch.length;
      } catch (err) {
        const message = errorMessage(err);
        failed.push(...batch.map((record) => ({ chunkId: record.chunkId, message })));
      }
    }

    return { inserted, failed };
  }

  async deleteByDocumentName(documentName: string): Promise<void> {
    this.assertOpen();
    await storeCall("delete", () =>
      this.client.delete(this.collectionName, {
        wait: true,
        filter: {
          must: [{ key: "document_name", match: { value: documentName } }],
        },
      }),
    );
  }

  async nearText(text: string, limit: number): Promise<VectorSearchResult[]> {
    this.assertOpen();
    const { embeddings } = await this.embedder.embed(text, "search_query");
    const vector = embeddings[0] ?? [];

    const points = await storeCall("search", () =>
      this.client.search(this.collectionName, {
        vector,
        limit,
        with_payload: true,
      }),
    );

    return points.map((point) => {
      const payload = searchPayloadSchema.safeParse(point.payload);
      if (!payload.success) {
        throw new StoreUnavailableError(`Stored record ${String(point.id)} has an invalid payload`);
      }
      return {
        id: String(point.id),
        ...scoreFromSimilarity(point.score),
        payload: payload.data,
      };
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async collectionExists(): Promise<boolean> {
    const { collections } = await storeCall("list collections", () =>
      this.client.getCollections(),
    );
    return collections.some((c) => c.name === this.collectionName);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError("Vector store session is closed");
    }
  }
}
