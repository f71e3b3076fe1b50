import type { IFlowOptions } from '../types/flow-options';
import type { FlowOperator } from './operator-types';

/**
 * Merges flow options into the definition
 *
 * @example
 * ```typescript
 * const { flow } = createFlow(
 *   withFlowOptions({ silentErrors: true, maxPullDepth: 64 }),
 *   withNodesConfig({ nodeTypes, nodes })
 * );
 * ```
 */
export function withFlowOptions(options: IFlowOptions): FlowOperator {
  return definition => ({
    ...definition,
    options: {
      ...definition.options,
      ...options,
    },
  });
}

/**
 * Sets the flow's title
 */
export function withTitle(title: string): FlowOperator {
  return definition => ({ ...definition, title });
}
