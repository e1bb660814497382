export { ingest } from "./ingestion-pipeline.js";
export type { IngestionDependencies } from "./ingestion-pipeline.js";

export { search } from "./retrieval-pipeline.js";
export type { RetrievalDependencies } from "./retrieval-pipeline.js";

export { initialize, deleteAll, deleteDocument } from "./lifecycle.js";
export type { StoreDependencies } from "./lifecycle.js";

export { linkContext } from "./context-linker.js";
export { buildRecord, buildRecords } from "./record-builder.js";
