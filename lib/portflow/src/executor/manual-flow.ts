import type { Node } from '../flow/node';
import type { NodeInput, NodeOutput } from '../flow/port';
import { FlowAlg } from '../types/flow-alg';
import { FlowExecutor } from './flow-executor';

/**
 * Executor without any propagation. Values are recorded as updated
 * until `clearUpdates()`, leaving traversal to the caller (a player).
 */
export class ManualFlow extends FlowExecutor {
  readonly mode = FlowAlg.MANUAL;

  private readonly updatedOutputs = new Set<NodeOutput>();

  setOutput(out: NodeOutput, value: unknown): void {
    this.storeOutput(out, value);
    this.updatedOutputs.add(out);
  }

  execOutput(out: NodeOutput): void {
    this.updatedOutputs.add(out);
  }

  /**
   * Whether the output feeding this input was updated since the last clear
   */
  inputUpdated(inp: NodeInput): boolean {
    const out = this.flow.connectedOutput(inp);
    return out !== null && this.updatedOutputs.has(out);
  }

  hasUpdatedOutputs(node: Node): boolean {
    return node.outputs.some(out => this.updatedOutputs.has(out));
  }

  updatedOutputsOf(node: Node): NodeOutput[] {
    return node.outputs.filter(out => this.updatedOutputs.has(out));
  }

  clearUpdates(): void {
    this.updatedOutputs.clear();
  }
}
