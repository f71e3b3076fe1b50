import type { Node } from '../flow/node';
import type { NodeInput, NodeOutput } from '../flow/port';
import { FlowAlg } from '../types/flow-alg';
import { PRODUCE_OUTPUT } from '../types/port';
import { PullDepthError } from '../utils/errors';
import { FlowExecutor } from './flow-executor';

/**
 * Control-flow execution. Exec outputs trigger connected nodes,
 * data is pulled from predecessors when an input is read.
 */
export class ExecFlowNaive extends FlowExecutor {
  readonly mode = FlowAlg.EXEC;

  // nodes currently producing output for a pulling reader
  private readonly pullStack: Node[] = [];

  /**
   * Updates the connected predecessor with PRODUCE_OUTPUT, then reads its output
   * @throws PullDepthError if the predecessor is already being pulled,
   * or pulls nest deeper than the flow's maxPullDepth
   */
  override input(inp: NodeInput): unknown {
    const out = this.flow.connectedOutput(inp);
    if (!out) {
      return inp.default;
    }

    const source = out.node;
    if (this.pullStack.includes(source)) {
      throw new PullDepthError(
        `Pull cycle: node '${source.title}' (${source.id}) is already producing output`,
        source.id
      );
    }
    if (this.pullStack.length >= this.flow.maxPullDepth) {
      throw new PullDepthError(
        `Pull depth ${this.flow.maxPullDepth} exceeded at node '${source.title}' (${source.id})`,
        source.id
      );
    }

    this.pullStack.push(source);
    try {
      this.activate(out, inp);
      source.update(PRODUCE_OUTPUT);
    } finally {
      this.pullStack.pop();
    }
    return out.value;
  }

  setOutput(out: NodeOutput, value: unknown): void {
    this.storeOutput(out, value);
  }

  execOutput(out: NodeOutput): void {
    for (const inp of [...this.flow.connectedInputs(out)]) {
      this.activate(out, inp);
      inp.node.update(inp.index);
    }
  }
}
