import { z } from 'zod';

/**
 * Graph model schemas
 *
 * Labels, natural keys and relationship types of the clinical property graph,
 * plus the declarative upsert plan the loader hands to a graph store.
 */

export const EntityTypeSchema = z.enum([
  'Provider',
  'Patient',
  'Encounter',
  'Condition',
  'Medication',
  'Observation',
]);

/**
 * Load order: every type comes after the types its rows usually reference.
 * Stub creation covers the references that arrive out of order anyway.
 */
export const ENTITY_LOAD_ORDER = [
  'Provider',
  'Patient',
  'Encounter',
  'Condition',
  'Medication',
  'Observation',
] as const satisfies readonly z.infer<typeof EntityTypeSchema>[];

/** Property holding the natural key of each label */
export const NATURAL_KEYS = {
  Provider: 'id',
  Patient: 'id',
  Encounter: 'id',
  Condition: 'code',
  Medication: 'code',
  Observation: 'id',
} as const satisfies Record<z.infer<typeof EntityTypeSchema>, 'id' | 'code'>;

export const RelationshipTypeSchema = z.enum([
  'HAS_ENCOUNTER',
  'HAS_PROVIDER',
  'HAS_CONDITION',
  'TAKES_MEDICATION',
  'HAS_MEDICATION',
  'HAS_OBSERVATION',
]);

export const GraphScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const NodeRefSchema = z.object({
  label: EntityTypeSchema,
  key: z.string().min(1),
});

export const NodeUpsertSchema = NodeRefSchema.extend({
  properties: z.record(GraphScalarSchema),
});

export const EdgeSpecSchema = z.object({
  from: NodeRefSchema,
  type: RelationshipTypeSchema,
  to: NodeRefSchema,
});

/**
 * Everything one source row writes. `node` is merged and its scalars overwritten,
 * `stubs` are merged by key only, `edges` are merged after both endpoints exist.
 */
export const UpsertPlanSchema = z.object({
  node: NodeUpsertSchema,
  stubs: z.array(NodeRefSchema),
  edges: z.array(EdgeSpecSchema),
});

export type GraphValue =
  | string
  | number
  | boolean
  | null
  | GraphValue[]
  | { [key: string]: GraphValue };

export const GraphValueSchema: z.ZodType<GraphValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(GraphValueSchema),
    z.record(GraphValueSchema),
  ])
);

export type EntityType = z.infer<typeof EntityTypeSchema>;
export type RelationshipType = z.infer<typeof RelationshipTypeSchema>;
export type GraphScalar = z.infer<typeof GraphScalarSchema>;
export type NodeRef = z.infer<typeof NodeRefSchema>;
export type NodeUpsert = z.infer<typeof NodeUpsertSchema>;
export type EdgeSpec = z.infer<typeof EdgeSpecSchema>;
export type UpsertPlan = z.infer<typeof UpsertPlanSchema>;
export type GraphRecord = Record<string, GraphValue>;
