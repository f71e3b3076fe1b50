import type { DataTypeRegistry } from '../core/type-registry';
import type { FlowOperator } from './operator-types';

/**
 * Resolves port type tags through a custom registry
 */
export function withTypeRegistry(typeRegistry: DataTypeRegistry): FlowOperator {
  return definition => ({
    ...definition,
    options: { ...definition.options, typeRegistry },
  });
}
