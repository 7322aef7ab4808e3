import { InMemoryGraphStore, createLogger } from '@clinigraph/core';
import { GraphLoader } from '@clinigraph/domain';

export const silent = createLogger({ name: 'test', level: 'silent' });

/**
 * Fresh in-memory graph holding one patient on two medications
 */
export async function seededStore(): Promise<InMemoryGraphStore> {
  const graph = new InMemoryGraphStore();
  const loader = new GraphLoader(graph, silent);
  await loader.upsert('Patient', [
    { PATIENT_ID: 'P001', FIRST_NAME: 'Alice', LAST_NAME: 'Nguyen', SEX: 'F', ZIP: '02115', AGE: 45 },
  ]);
  await loader.upsert('Medication', [
    { ENC_ID: null, PATIENT_ID: 'P001', RXNORM: '860975', NAME: 'Metformin' },
    { ENC_ID: null, PATIENT_ID: 'P001', RXNORM: '314076', NAME: 'Lisinopril' },
  ]);
  return graph;
}

/**
 * Store factory that records every store it hands out
 */
export function trackingFactory(make: () => Promise<InMemoryGraphStore> = seededStore) {
  const opened: InMemoryGraphStore[] = [];
  const open = async () => {
    const store = await make();
    opened.push(store);
    return store;
  };
  return { open, opened };
}
