import { FlowAlg, parseFlowAlg } from '../types/flow-alg';
import type { FlowOperator } from './operator-types';

/**
 * Selects the executor the flow starts with
 * @throws Error for unknown mode names
 */
export function withAlgorithmMode(mode: FlowAlg | string): FlowOperator {
  const algorithmMode = typeof mode === 'string' ? parseFlowAlg(mode) : mode;
  if (algorithmMode === undefined) {
    throw new Error(`withAlgorithmMode: unknown algorithm mode '${String(mode)}'`);
  }

  return definition => ({
    ...definition,
    options: { ...definition.options, algorithmMode },
  });
}
