import { randomUUID } from "node:crypto";
import type { BatchInsertResult, DocumentRecord, StoredRecordPayload } from "@docrag/types";
import type { IEmbeddingProvider } from "@docrag/embeddings";
import { StoreUnavailableError, errorMessage } from "@docrag/errors";
import type {
  IVectorStore,
  VectorSearchResult,
  VectorStoreSession,
} from "./vector-store.interface.js";
import { toPayload } from "./payload.js";
import { cosineSimilarity, scoreFromSimilarity } from "./similarity.js";

interface MemoryPoint {
  id: string;
  vector: number[];
  payload: StoredRecordPayload;
}

/** `points` is undefined while the collection does not exist. */
interface MemoryCollection {
  name: string;
  points: MemoryPoint[] | undefined;
}

/**
 * In-process store with the same contract as the Qdrant adapter. The
 * collection lives on the store instance and is shared by its sessions.
 */
export class MemoryVectorStore implements IVectorStore {
  readonly collectionName: string;
  private embedder: IEmbeddingProvider;
  private collection: MemoryCollection;

  constructor(options: { collectionName: string; embedder: IEmbeddingProvider }) {
    this.collectionName = options.collectionName;
    this.embedder = options.embedder;
    this.collection = { name: options.collectionName, points: undefined };
  }

  async connect(): Promise<VectorStoreSession> {
    return new MemorySession(this.collection, this.embedder);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Stored payloads in insertion order; empty when the collection does not exist. */
  records(): StoredRecordPayload[] {
    return (this.collection.points ?? []).map((point) => ({ ...point.payload }));
  }

  get hasCollection(): boolean {
    return this.collection.points !== undefined;
  }
}

class MemorySession implements VectorStoreSession {
  private closed = false;

  constructor(
    private collection: MemoryCollection,
    private embedder: IEmbeddingProvider,
  ) {}

  async ensureCollection(): Promise<void> {
    this.assertOpen();
    this.collection.points ??= [];
  }

  async deleteCollection(): Promise<void> {
    this.assertOpen();
    this.collection.points = undefined;
  }

  async insertBatch(records: DocumentRecord[]): Promise<BatchInsertResult> {
    this.assertOpen();
    if (records.length === 0) return { inserted: 0, failed: [] };

    try {
      const points = this.existingPoints();
      const { embeddings } = await this.embedder.batchEmbed(
        records.map((r) => r.text),
        "search_document",
      );
      records.forEach((record, i) => {
        points.push({ id: randomUUID(), vector: embeddings[i] ?? [], payload: toPayload(record) });
      });
      return { inserted: records.length, failed: [] };
    } catch (err) {
      const message = errorMessage(err);
      return {
        inserted: 0,
        failed: records.map((record) => ({ chunkId: record.chunkId, message })),
      };
    }
  }

  async deleteByDocumentName(documentName: string): Promise<void> {
    this.assertOpen();
    this.collection.points = this.existingPoints().filter(
      (point) => point.payload.document_name !== documentName,
    );
  }

  async nearText(text: string, limit: number): Promise<VectorSearchResult[]> {
    this.assertOpen();
    const points = this.existingPoints();
    const { embeddings } = await this.embedder.embed(text, "search_query");
    const query = embeddings[0] ?? [];

    return points
      .map((point) => ({ point, similarity: cosineSimilarity(query, point.vector) }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit)
      .map(({ point, similarity }) => ({
        id: point.id,
        ...scoreFromSimilarity(similarity),
        payload: { ...point.payload },
      }));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private existingPoints(): MemoryPoint[] {
    if (!this.collection.points) {
      throw new StoreUnavailableError(`Collection ${this.collection.name} does not exist`);
    }
    return this.collection.points;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError("Vector store session is closed");
    }
  }
}
