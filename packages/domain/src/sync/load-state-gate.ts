import { createLogger, type GraphStore, type Logger } from '@clinigraph/core';
import type { EntityType } from '@clinigraph/types';

export interface LoadDecision {
  skip: boolean;
  existingNodes: number;
}

/**
 * Decides whether an entity type still needs loading.
 * Any existing node of the label counts as loaded; partial loads are not detected.
 */
export class LoadStateGate {
  private readonly logger: Logger;

  constructor(
    private readonly graph: GraphStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ name: 'load-state-gate' });
  }

  async check(entityType: EntityType): Promise<LoadDecision> {
    const existingNodes = await this.graph.countNodes(entityType);
    const skip = existingNodes > 0;

    if (skip) {
      this.logger.warn(
        { entityType, existingNodes },
        `Found ${existingNodes} existing ${entityType} nodes, skipping load`
      );
    }

    return { skip, existingNodes };
  }

  async shouldSkip(entityType: EntityType): Promise<boolean> {
    return (await this.check(entityType)).skip;
  }
}
