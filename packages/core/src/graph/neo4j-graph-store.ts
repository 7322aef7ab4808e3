import neo4j, { type Driver, type Session } from 'neo4j-driver';

import {
  ENTITY_LOAD_ORDER,
  NATURAL_KEYS,
  type EntityType,
  type GraphRecord,
  type NodeRef,
  type UpsertPlan,
} from '@clinigraph/types';

import type { GraphConfig } from '../env.js';
import { GraphStoreUnavailableError, QueryExecutionError, toError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { GraphQuery, GraphStore } from './types.js';
import { toGraphValue } from './values.js';

function mergeClause(variable: string, ref: NodeRef, param: string): string {
  return `MERGE (${variable}:${ref.label} {${NATURAL_KEYS[ref.label]}: $${param}})`;
}

/**
 * Neo4j graph store over the Bolt protocol
 */
export class Neo4jGraphStore implements GraphStore {
  private readonly driver: Driver;
  private readonly database: string;
  private readonly logger: Logger;

  constructor(config: GraphConfig) {
    this.driver = neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password));
    this.database = config.database;
    this.logger = createLogger({ name: 'graph-store' });
    this.logger.info({ uri: config.uri, database: config.database }, 'Graph store driver created');
  }

  private session(mode: 'READ' | 'WRITE'): Session {
    return this.driver.session({
      database: this.database,
      defaultAccessMode: mode === 'READ' ? neo4j.session.READ : neo4j.session.WRITE,
    });
  }

  async verifyConnectivity(): Promise<void> {
    try {
      await this.driver.getServerInfo({ database: this.database });
    } catch (error) {
      throw new GraphStoreUnavailableError('Could not connect to the graph store', toError(error));
    }
  }

  async countNodes(label: EntityType): Promise<number> {
    const session = this.session('READ');
    try {
      const result = await session.executeRead((tx) =>
        tx.run(`MATCH (n:${label}) RETURN count(n) AS c`)
      );
      const count = toGraphValue(result.records[0]?.get('c'));
      return typeof count === 'number' ? count : 0;
    } finally {
      await session.close();
    }
  }

  async applyUpsertPlan(plan: UpsertPlan): Promise<void> {
    const session = this.session('WRITE');
    try {
      await session.executeWrite(async (tx) => {
        await tx.run(`${mergeClause('n', plan.node, 'key')} SET n += $properties`, {
          key: plan.node.key,
          properties: plan.node.properties,
        });

        for (const stub of plan.stubs) {
          await tx.run(mergeClause('s', stub, 'key'), { key: stub.key });
        }

        for (const edge of plan.edges) {
          const from = `(a:${edge.from.label} {${NATURAL_KEYS[edge.from.label]}: $from})`;
          const to = `(b:${edge.to.label} {${NATURAL_KEYS[edge.to.label]}: $to})`;
          await tx.run(`MATCH ${from}, ${to} MERGE (a)-[:${edge.type}]->(b)`, {
            from: edge.from.key,
            to: edge.to.key,
          });
        }
      });
    } finally {
      await session.close();
    }
  }

  async read(query: GraphQuery): Promise<GraphRecord[]> {
    const session = this.session('READ');
    try {
      const result = await session.executeRead((tx) => tx.run(query.cypher, query.params));
      return result.records.map((record) => {
        const row: GraphRecord = {};
        for (const key of record.keys) {
          row[String(key)] = toGraphValue(record.get(key));
        }
        return row;
      });
    } catch (error) {
      throw new QueryExecutionError('Graph read failed', toError(error));
    } finally {
      await session.close();
    }
  }

  async ensureConstraints(): Promise<void> {
    const session = this.session('WRITE');
    try {
      for (const label of ENTITY_LOAD_ORDER) {
        const key = NATURAL_KEYS[label];
        await session.run(
          `CREATE CONSTRAINT ${label.toLowerCase()}_${key}_unique IF NOT EXISTS ` +
            `FOR (n:${label}) REQUIRE n.${key} IS UNIQUE`
        );
      }
      this.logger.info('Natural-key constraints ensured');
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
    this.logger.info('Graph store driver closed');
  }
}
