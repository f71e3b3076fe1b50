import type { Flow } from '../flow/flow';
import { FlowAlg } from '../types/flow-alg';
import { DataFlowNaive } from './data-flow-naive';
import { DataFlowOptimized } from './data-flow-optimized';
import { ExecFlowNaive } from './exec-flow-naive';
import type { FlowExecutor } from './flow-executor';
import { ManualFlow } from './manual-flow';

export { FlowExecutor } from './flow-executor';
export { ManualFlow } from './manual-flow';
export { DataFlowNaive } from './data-flow-naive';
export { DataFlowOptimized } from './data-flow-optimized';
export { ExecFlowNaive } from './exec-flow-naive';
export { collectReachable, countPredecessors, findCycleNodes } from './graph-utils';

/**
 * Creates the executor implementing an algorithm mode
 */
export function executorFromFlowAlg(mode: FlowAlg, flow: Flow): FlowExecutor {
  switch (mode) {
    case FlowAlg.MANUAL:
      return new ManualFlow(flow);
    case FlowAlg.DATA:
      return new DataFlowNaive(flow);
    case FlowAlg.DATA_OPT:
      return new DataFlowOptimized(flow);
    case FlowAlg.EXEC:
      return new ExecFlowNaive(flow);
  }
}
