import { describe, it, expect, vi } from "vitest";
import type { DocumentRecord } from "@docrag/types";
import { StoreUnavailableError, ValidationError } from "@docrag/errors";
import {
  createVectorStore,
  MemoryVectorStore,
  QdrantVectorStore,
  withSession,
} from "./index.js";
import type { QdrantClientLike, VectorStoreSession } from "./index.js";
import { KeywordEmbeddingProvider } from "./testing/index.js";

const VOCABULARY = ["refund", "policy", "shipping", "days"];

function record(chunkId: number, text: string, documentName = "faq.txt"): DocumentRecord {
  return {
    documentName,
    documentType: "txt",
    chunkId,
    totalChunks: 3,
    text,
    contextBefore: "",
    contextAfter: "",
  };
}

function fakeQdrantClient() {
  return {
    getCollections: vi.fn().mockResolvedValue({ collections: [] }),
    createCollection: vi.fn().mockResolvedValue(true),
    deleteCollection: vi.fn().mockResolvedValue(true),
    createPayloadIndex: vi.fn().mockResolvedValue({ status: "completed" }),
    upsert: vi.fn().mockResolvedValue({ status: "completed" }),
    delete: vi.fn().mockResolvedValue({ status: "completed" }),
    search: vi.fn().mockResolvedValue([]),
  } satisfies QdrantClientLike;
}

function qdrantStore(client: QdrantClientLike, embedder = new KeywordEmbeddingProvider(VOCABULARY)) {
  return new QdrantVectorStore({
    url: "http://localhost:6333",
    collectionName: "DocumentChunk",
    embedder,
    createClient: () => client,
  });
}

describe("Vector Store", () => {
  describe("createVectorStore factory", () => {
    const embedder = new KeywordEmbeddingProvider(VOCABULARY);

    it("creates QdrantVectorStore for type 'qdrant'", () => {
      const store = createVectorStore(
        { type: "qdrant", collectionName: "DocumentChunk", qdrantUrl: "http://localhost:6333" },
        embedder,
      );
      expect(store).toBeInstanceOf(QdrantVectorStore);
      expect(store.collectionName).toBe("DocumentChunk");
    });

    it("creates MemoryVectorStore for type 'memory'", () => {
      const store = createVectorStore({ type: "memory", collectionName: "Chunks" }, embedder);
      expect(store).toBeInstanceOf(MemoryVectorStore);
    });

    it("throws for missing qdrantUrl", () => {
      expect(() =>
        createVectorStore({ type: "qdrant", collectionName: "DocumentChunk" }, embedder),
      ).toThrow(ValidationError);
    });
  });

  describe("withSession", () => {
    it("closes the session after the callback resolves", async () => {
      const store = new MemoryVectorStore({
        collectionName: "DocumentChunk",
        embedder: new KeywordEmbeddingProvider(VOCABULARY),
      });
      const sessions: VectorStoreSession[] = [];

      await withSession(store, async (session) => {
        sessions.push(session);
        await session.ensureCollection();
      });

      await expect(sessions[0]?.ensureCollection()).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it("closes the session when the callback throws", async () => {
      const close = vi.fn().mockResolvedValue(undefined);
      const store = new MemoryVectorStore({
        collectionName: "DocumentChunk",
        embedder: new KeywordEmbeddingProvider(VOCABULARY),
      });
      vi.spyOn(store, "connect").mockImplementation(async () => {
        const session = await MemoryVectorStore.prototype.connect.call(store);
        session.close = close;
        return session;
      });

      await expect(
        withSession(store, () => Promise.reject(new Error("boom"))),
      ).rejects.toThrow("boom");
      expect(close).toHaveBeenCalledTimes(1);
    });
  });

  describe("MemoryVectorStore", () => {
    async function seeded() {
      const store = new MemoryVectorStore({
        collectionName: "DocumentChunk",
        embedder: new KeywordEmbeddingProvider(VOCABULARY),
      });
      await withSession(store, async (session) => {
        await session.ensureCollection();
        await session.insertBatch([
          record(0, "refund policy details"),
          record(1, "shipping takes days"),
          record(2, "refund within days"),
        ]);
      });
      return store;
    }

    it("returns results by descending similarity", async () => {
      const store = await seeded();

      const results = await withSession(store, (s) => s.nearText("refund policy", 3));

      expect(results.map((r) => r.payload.chunk_id)).toEqual([0, 2, 1]);
      expect(results[0]?.relevanceScore).toBeCloseTo(1);
      expect(results[0]?.distance).toBeCloseTo(0);
      expect(results[1]?.relevanceScore).toBeCloseTo(0.75);
      expect(results[1]?.distance).toBeCloseTo(0.5);
      expect(results[2]?.relevanceScore).toBeCloseTo(0.5);
      expect(results[2]?.distance).toBeCloseTo(1);
    });

    it("honours the limit", async () => {
      const store = await seeded();
      const results = await withSession(store, (s) => s.nearText("refund", 1));
      expect(results).toHaveLength(1);
    });

    it("keeps insertion order for equal scores", async () => {
      const store = await seeded();
      const results = await withSession(store, (s) => s.nearText("days", 3));
      expect(results.map((r) => r.payload.chunk_id)).toEqual([1, 2, 0]);
    });

    it("deletes only the named document", async () => {
      const store = await seeded();
      await withSession(store, async (session) => {
        await session.insertBatch([record(0, "other policy", "other.txt")]);
        await session.deleteByDocumentName("faq.txt");
      });

      expect(store.records().map((r) => r.document_name)).toEqual(["other.txt"]);
    });

    it("stores snake_case payloads", async () => {
      const store = await seeded();
      expect(store.records()[0]).toEqual({
        document_name: "faq.txt",
        chunk_id: 0,
        document_type: "txt",
        total_chunks: 3,
        text: "refund policy details",
        context_before: "",
        context_after: "",
      });
    });

    it("embeds records as documents and queries as queries", async () => {
      const embedder = new KeywordEmbeddingProvider(VOCABULARY);
      const store = new MemoryVectorStore({ collectionName: "DocumentChunk", embedder });
      await withSession(store, async (session) => {
        await session.ensureCollection();
        await session.insertBatch([record(0, "refund")]);
        await session.nearText("refund", 1);
      });

      expect(embedder.calls.map((c) => c.inputType)).toEqual(["search_document", "search_query"]);
    });

    it("reports every record as failed when embedding fails", async () => {
      const embedder = new KeywordEmbeddingProvider(VOCABULARY);
      vi.spyOn(embedder, "batchEmbed").mockRejectedValue(new Error("quota exceeded"));
      const store = new MemoryVectorStore({ collectionName: "DocumentChunk", embedder });

      const result = await withSession(store, async (session) => {
        await session.ensureCollection();
        return session.insertBatch([record(0, "a"), record(1, "b")]);
      });

      expect(result).toEqual({
        inserted: 0,
        failed: [
          { chunkId: 0, message: "quota exceeded" },
          { chunkId: 1, message: "quota exceeded" },
        ],
      });
      expect(store.records()).toEqual([]);
    });

    it("drops the collection on deleteCollection", async () => {
      const store = await seeded();
      await withSession(store, (s) => s.deleteCollection());

      expect(store.hasCollection).toBe(false);
      await expect(withSession(store, (s) => s.nearText("refund", 1))).rejects.toThrow(
        "Collection DocumentChunk does not exist",
      );
    });
  });

  describe("QdrantVectorStore", () => {
    it("raises StoreUnavailableError when the server cannot be reached", async () => {
      const client = fakeQdrantClient();
      client.getCollections.mockRejectedValue(new Error("connect ECONNREFUSED"));

      await expect(qdrantStore(client).connect()).rejects.toBeInstanceOf(StoreUnavailableError);
      await expect(qdrantStore(client).healthCheck()).resolves.toBe(false);
    });

    it("creates a cosine collection with a document_name index", async () => {
      const client = fakeQdrantClient();

      await withSession(qdrantStore(client), (s) => s.ensureCollection());

      expect(client.createCollection).toHaveBeenCalledWith("DocumentChunk", {
        vectors: { size: 4, distance: "Cosine" },
      });
      expect(client.createPayloadIndex).toHaveBeenCalledWith("DocumentChunk", {
        field_name: "document_name",
        field_schema: "keyword",
        wait: true,
      });
    });

    it("leaves an existing collection alone", async () => {
      const client = fakeQdrantClient();
      client.getCollections.mockResolvedValue({ collections: [{ name: "DocumentChunk" }] });

      await withSession(qdrantStore(client), (s) => s.ensureCollection());

      expect(client.createCollection).not.toHaveBeenCalled();
    });

    it("skips deleteCollection when the collection is missing", async () => {
      const client = fakeQdrantClient();

      await withSession(qdrantStore(client), (s) => s.deleteCollection());

      expect(client.deleteCollection).not.toHaveBeenCalled();
    });

    it("inserts in batches of 100 and records failed batches", async () => {
      const client = fakeQdrantClient();
      client.upsert
        .mockResolvedValueOnce({ status: "completed" })
        .mockRejectedValueOnce(new Error("timeout"))
        .mockResolvedValueOnce({ status: "completed" });
      const records = Array.from({ length: 250 }, (_, i) => record(i, `refund ${String(i)}`));

      const result = await withSession(qdrantStore(client), (s) => s.insertBatch(records));

      expect(client.upsert).toHaveBeenCalledTimes(3);
      expect(result.inserted).toBe(150);
      expect(result.failed).toHaveLength(100);
      expect(result.failed[0]).toEqual({ chunkId: 100, message: "timeout" });
      expect(result.failed[99]).toEqual({ chunkId: 199, message: "timeout" });
    });

    it("deletes by document_name filter", async () => {
      const client = fakeQdrantClient();

      await withSession(qdrantStore(client), (s) => s.deleteByDocumentName("faq.txt"));

      expect(client.delete).toHaveBeenCalledWith("DocumentChunk", {
        wait: true,
        filter: { must: [{ key: "document_name", match: { value: "faq.txt" } }] },
      });
    });

    it("maps cosine scores to relevance and distance", async () => {
      const client = fakeQdrantClient();
      client.search.mockResolvedValue([
        {
          id: "p-1",
          version: 1,
          score: 0.5,
          payload: {
            document_name: "faq.txt",
            chunk_id: 2,
            document_type: "txt",
            total_chunks: 3,
            text: "refund within days",
          },
        },
      ]);
      const embedder = new KeywordEmbeddingProvider(VOCABULARY);

      const results = await withSession(qdrantStore(client, embedder), (s) =>
        s.nearText("refund policy", 5),
      );

      expect(client.search).toHaveBeenCalledWith("DocumentChunk", {
        vector: [1, 1, 0, 0],
        limit: 5,
        with_payload: true,
      });
      expect(embedder.calls[0]?.inputType).toBe("search_query");
      expect(results).toEqual([
        {
          id: "p-1",
          relevanceScore: 0.75,
          distance: 0.5,
          payload: {
            document_name: "faq.txt",
            chunk_id: 2,
            document_type: "txt",
            total_chunks: 3,
            text: "refund within days",
          },
        },
      ]);
    });

    it("rejects a stored record with an invalid payload", async () => {
      const client = fakeQdrantClient();
      client.search.mockResolvedValue([{ id: 7, version: 1, score: 0.9, payload: { text: 1 } }]);

      await expect(
        withSession(qdrantStore(client), (s) => s.nearText("refund", 1)),
      ).rejects.toThrow("Stored record 7 has an invalid payload");
    });

    it("wraps client failures in StoreUnavailableError", async () => {
      const client = fakeQdrantClient();
      client.delete.mockRejectedValue(new Error("socket hang up"));

      await expect(
        withSession(qdrantStore(client), (s) => s.deleteByDocumentName("faq.txt")),
      ).rejects.toThrow("Vector store delete failed: socket hang up");
    });

    it("rejects calls on a closed session", async () => {
      const session = await qdrantStore(fakeQdrantClient()).connect();
      await session.close();

      await expect(session.nearText("refund", 1)).rejects.toThrow(
        "Vector store session is closed",
      );
    });
  });
});
