import { ENTITY_LOAD_ORDER, EntityTypeSchema, type EntityType } from '@clinigraph/types';

export interface CliOptions {
  command: 'sync' | 'health' | 'help';
  entityTypes?: EntityType[];
}

export function parseArgs(args: readonly string[]): CliOptions | string {
  const options: CliOptions = { command: 'sync' };

  for (const arg of args) {
    if (arg === 'health') {
      options.command = 'health';
    } else if (arg === 'sync') {
      options.command = 'sync';
    } else if (arg === '-h' || arg === '--help') {
      options.command = 'help';
    } else if (arg.startsWith('--only=')) {
      const entityTypes: EntityType[] = [];
      for (const name of (arg.split('=')[1] ?? '').split(',')) {
        const parsed = EntityTypeSchema.safeParse(name.trim());
        if (!parsed.success) {
          return `Unknown entity type "${name}". Expected one of ${ENTITY_LOAD_ORDER.join(', ')}`;
        }
        entityTypes.push(parsed.data);
      }
      // Dependency order wins over the order given
      options.entityTypes = ENTITY_LOAD_ORDER.filter((type) => entityTypes.includes(type));
    } else {
      return `Unknown argument "${arg}"`;
    }
  }
  return options;
}
