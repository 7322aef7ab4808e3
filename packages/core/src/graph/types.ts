import type { EntityType, GraphRecord, GraphScalar, Intent, UpsertPlan } from '@clinigraph/types';

/**
 * How a patient-scoped parameter selects patients
 * - `id`: exact, case-insensitive identifier match
 * - `name-or-id`: case-insensitive substring of `full_name`, or exact identifier
 */
export type PatientMatch = 'id' | 'name-or-id';

/**
 * Structured description of a router query. Stores that cannot run Cypher
 * evaluate this instead.
 */
export interface NamedQuery {
  intent: Intent;
  /** Lower-cased search term */
  term: string;
  patientMatch: PatientMatch | null;
  limit: number;
}

export interface GraphQuery {
  cypher: string;
  params: Record<string, GraphScalar>;
  named?: NamedQuery;
}

/**
 * Port to the property graph
 */
export interface GraphStore {
  /** Number of nodes carrying the label */
  countNodes(label: EntityType): Promise<number>;
  /** Apply one row's plan atomically */
  applyUpsertPlan(plan: UpsertPlan): Promise<void>;
  /** Run a read-only query; integers come back as JS numbers */
  read(query: GraphQuery): Promise<GraphRecord[]>;
  /** Declare natural-key uniqueness constraints if absent */
  ensureConstraints(): Promise<void>;
  verifyConnectivity(): Promise<void>;
  close(): Promise<void>;
}
