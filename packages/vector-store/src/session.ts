import type { IVectorStore, VectorStoreSession } from "./vector-store.interface.js";

/** Opens a session, runs `fn` and closes the session whether `fn` succeeds or not. */
export async function withSession<T>(
  store: IVectorStore,
  fn: (session: VectorStoreSession) => Promise<T>,
): Promise<T> {
  const session = await store.connect();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
