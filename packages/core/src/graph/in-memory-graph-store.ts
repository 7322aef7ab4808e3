import type {
  EdgeSpec,
  EntityType,
  GraphRecord,
  GraphScalar,
  NodeRef,
  RelationshipType,
  UpsertPlan,
} from '@clinigraph/types';

import { QueryExecutionError } from '../errors.js';
import type { GraphQuery, GraphStore, NamedQuery } from './types.js';

type Properties = Record<string, GraphScalar>;

interface StoredNode {
  label: EntityType;
  key: string;
  properties: Properties;
}

const refId = (ref: NodeRef) => `${ref.label}:${ref.key}`;
const edgeId = (edge: EdgeSpec) => `${refId(edge.from)}-${edge.type}->${refId(edge.to)}`;

function text(value: GraphScalar | undefined): string {
  return typeof value === 'string' ? value.toLowerCase() : '';
}

/**
 * In-memory graph store for tests and local development.
 * Evaluates the router's named queries directly; free-form Cypher is refused.
 */
export class InMemoryGraphStore implements GraphStore {
  private readonly nodes = new Map<string, StoredNode>();
  private readonly edges = new Map<string, EdgeSpec>();
  private closed = false;

  countNodes(label: EntityType): Promise<number> {
    let count = 0;
    for (const node of this.nodes.values()) {
      if (node.label === label) count++;
    }
    return Promise.resolve(count);
  }

  applyUpsertPlan(plan: UpsertPlan): Promise<void> {
    const present = new Set([refId(plan.node), ...plan.stubs.map(refId)]);
    for (const edge of plan.edges) {
      for (const endpoint of [edge.from, edge.to]) {
        if (!present.has(refId(endpoint)) && !this.nodes.has(refId(endpoint))) {
          return Promise.reject(
            new Error(`Dangling edge ${edgeId(edge)}: ${refId(endpoint)} does not exist`)
          );
        }
      }
    }

    const existing = this.nodes.get(refId(plan.node));
    this.nodes.set(refId(plan.node), {
      label: plan.node.label,
      key: plan.node.key,
      properties: { ...existing?.properties, ...plan.node.properties },
    });

    for (const stub of plan.stubs) {
      if (!this.nodes.has(refId(stub))) {
        this.nodes.set(refId(stub), { label: stub.label, key: stub.key, properties: {} });
      }
    }

    for (const edge of plan.edges) {
      this.edges.set(edgeId(edge), edge);
    }
    return Promise.resolve();
  }

  read(query: GraphQuery): Promise<GraphRecord[]> {
    if (!query.named) {
      return Promise.reject(
        new QueryExecutionError('In-memory graph store only evaluates named queries')
      );
    }
    return Promise.resolve(this.evaluate(query.named).slice(0, query.named.limit));
  }

  ensureConstraints(): Promise<void> {
    return Promise.resolve();
  }

  verifyConnectivity(): Promise<void> {
    return this.closed
      ? Promise.reject(new Error('In-memory graph store is closed'))
      : Promise.resolve();
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getNode(label: EntityType, key: string): Properties | undefined {
    return this.nodes.get(refId({ label, key }))?.properties;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  hasEdge(edge: EdgeSpec): boolean {
    return this.edges.has(edgeId(edge));
  }

  /** Nodes reachable from `node` over outgoing edges of `type` */
  private neighbours(node: StoredNode, type: RelationshipType, label: EntityType): StoredNode[] {
    const result: StoredNode[] = [];
    for (const edge of this.edges.values()) {
      if (edge.type !== type || edge.to.label !== label || refId(edge.from) !== refId(node)) {
        continue;
      }
      const target = this.nodes.get(refId(edge.to));
      if (target) result.push(target);
    }
    return result;
  }

  private nodesOf(label: EntityType): StoredNode[] {
    return [...this.nodes.values()].filter((node) => node.label === label);
  }

  private matchPatients(query: NamedQuery): StoredNode[] {
    return this.nodesOf('Patient').filter((patient) => {
      const idMatches = patient.key.toLowerCase() === query.term;
      if (query.patientMatch === 'id') return idMatches;
      return idMatches || text(patient.properties.full_name).includes(query.term);
    });
  }

  private patientsWithCondition(term: string): Array<[StoredNode, StoredNode]> {
    const pairs: Array<[StoredNode, StoredNode]> = [];
    for (const patient of this.nodesOf('Patient')) {
      for (const condition of this.neighbours(patient, 'HAS_CONDITION', 'Condition')) {
        if (text(condition.properties.name).includes(term)) {
          pairs.push([patient, condition]);
        }
      }
    }
    return pairs;
  }

  private evaluate(query: NamedQuery): GraphRecord[] {
    const prop = (node: StoredNode, name: string) => node.properties[name] ?? null;
    const patientColumns = (p: StoredNode) => ({
      patient_id: p.key,
      full_name: prop(p, 'full_name'),
    });

    switch (query.intent) {
      case 'patients-by-condition':
        return this.patientsWithCondition(query.term).map(([p, c]) => ({
          ...patientColumns(p),
          sex: prop(p, 'sex'),
          age: prop(p, 'age'),
          condition: prop(c, 'name'),
        }));

      case 'medications-by-condition': {
        const patients = new Map(
          this.patientsWithCondition(query.term).map(([p]) => [refId(p), p])
        );
        const usage = new Map<string, { medication: StoredNode; patients: Set<string> }>();
        for (const patient of patients.values()) {
          for (const medication of this.neighbours(patient, 'TAKES_MEDICATION', 'Medication')) {
            const entry = usage.get(medication.key) ?? { medication, patients: new Set<string>() };
            entry.patients.add(patient.key);
            usage.set(medication.key, entry);
          }
        }
        return [...usage.values()]
          .sort((a, b) => b.patients.size - a.patients.size)
          .map(({ medication, patients: users }) => ({
            rxnorm: medication.key,
            medication: prop(medication, 'name'),
            patients_on_med: users.size,
          }));
      }

      case 'medications-by-patient':
        return this.matchPatients(query).flatMap((p) =>
          this.neighbours(p, 'TAKES_MEDICATION', 'Medication').map((m) => ({
            ...patientColumns(p),
            rxnorm: m.key,
            medication: prop(m, 'name'),
          }))
        );

      case 'provider-by-patient':
        return this.matchPatients(query).flatMap((p) =>
          this.neighbours(p, 'HAS_PROVIDER', 'Provider').map((pr) => ({
            ...patientColumns(p),
            provider_id: pr.key,
            provider: prop(pr, 'name'),
            specialty: prop(pr, 'specialty'),
            state: prop(pr, 'state'),
          }))
        );

      case 'observations-by-patient':
        return this.matchPatients(query)
          .flatMap((p) =>
            this.neighbours(p, 'HAS_OBSERVATION', 'Observation').map((o) => ({
              ...patientColumns(p),
              observation_id: o.key,
              description: prop(o, 'description'),
              value: prop(o, 'value'),
              unit: prop(o, 'unit'),
              category: prop(o, 'category'),
              obs_datetime: prop(o, 'obs_datetime'),
            }))
          )
          .sort((a, b) => String(b.obs_datetime).localeCompare(String(a.obs_datetime)));

      case 'encounters-by-patient':
        return this.matchPatients(query)
          .flatMap((p) =>
            this.neighbours(p, 'HAS_ENCOUNTER', 'Encounter').map((e) => ({
              ...patientColumns(p),
              encounter_id: e.key,
              start_time: prop(e, 'start_time'),
              end_time: prop(e, 'end_time'),
              provider_id: prop(e, 'provider_npi'),
            }))
          )
          .sort((a, b) => String(b.start_time).localeCompare(String(a.start_time)));
    }
  }
}
