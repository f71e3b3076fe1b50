import type { NodeInput, NodeOutput } from '../flow/port';
import { FlowAlg } from '../types/flow-alg';
import { FlowExecutor } from './flow-executor';

/**
 * Eager depth-first push propagation.
 *
 * A node fed by several branches of a common ancestor is updated once per
 * branch. Use {@link DataFlowOptimized} where that matters.
 */
export class DataFlowNaive extends FlowExecutor {
  readonly mode: FlowAlg = FlowAlg.DATA;

  setOutput(out: NodeOutput, value: unknown): void {
    this.storeOutput(out, value);
    this.propagate(out);
  }

  execOutput(out: NodeOutput): void {
    this.propagate(out);
  }

  override connAdded(out: NodeOutput, inp: NodeInput, silent: boolean): void {
    super.connAdded(out, inp, silent);
    if (!silent && out.isData()) {
      inp.node.update(inp.index);
    }
  }

  override connRemoved(out: NodeOutput, inp: NodeInput, silent: boolean): void {
    super.connRemoved(out, inp, silent);
    if (!silent && out.isData()) {
      inp.node.update(inp.index);
    }
  }

  protected propagate(out: NodeOutput): void {
    // copy, a callback may rewire this output
    for (const inp of [...this.flow.connectedInputs(out)]) {
      this.activate(out, inp);
      inp.node.update(inp.index);
    }
  }
}
