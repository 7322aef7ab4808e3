import type { GraphConfig } from '../env.js';
import { Neo4jGraphStore } from './neo4j-graph-store.js';
import type { GraphStore } from './types.js';

export type { GraphQuery, GraphStore, NamedQuery, PatientMatch } from './types.js';
export { Neo4jGraphStore } from './neo4j-graph-store.js';
export { InMemoryGraphStore } from './in-memory-graph-store.js';
export { toGraphValue } from './values.js';

/**
 * Create a graph store and confirm it is reachable
 */
export async function createGraphStore(config: GraphConfig): Promise<GraphStore> {
  const store = new Neo4jGraphStore(config);
  try {
    await store.verifyConnectivity();
  } catch (error) {
    await store.close();
    throw error;
  }
  return store;
}

/**
 * Run `fn` with an open graph store, closing it on every exit path
 */
export async function withGraphStore<T>(
  open: () => Promise<GraphStore>,
  fn: (store: GraphStore) => Promise<T>
): Promise<T> {
  const store = await open();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
