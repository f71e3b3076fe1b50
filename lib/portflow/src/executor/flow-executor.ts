import type { Flow } from '../flow/flow';
import type { Node } from '../flow/node';
import type { NodeInput, NodeOutput } from '../flow/port';
import type { FlowAlg } from '../types/flow-alg';
import { FlowEventType } from '../types/flow-hooks';
import { createNodeError, NodeError } from '../utils/errors';

/**
 * Strategy deciding how data and triggers travel through a flow.
 * Every node/port interaction goes through the flow's active executor.
 */
export abstract class FlowExecutor {
  abstract readonly mode: FlowAlg;

  /**
   * Set when the topology changed since stateful bookkeeping was computed
   */
  protected flowChanged = true;

  constructor(protected readonly flow: Flow) {}

  /**
   * Invokes the node's update callback
   */
  updateNode(node: Node, inp: number): void {
    this.invokeNode(node, inp);
  }

  /**
   * Value present at a data input: the connected output's value, else the default
   */
  input(inp: NodeInput): unknown {
    const out = this.flow.connectedOutput(inp);
    return out ? out.value : inp.default;
  }

  abstract setOutput(out: NodeOutput, value: unknown): void;

  abstract execOutput(out: NodeOutput): void;

  /**
   * Called when the executor becomes the flow's active one again. The
   * topology may have changed while another executor was active.
   */
  reset(): void {
    this.flowChanged = true;
  }

  connAdded(_out: NodeOutput, _inp: NodeInput, _silent: boolean): void {
    this.flowChanged = true;
  }

  connRemoved(_out: NodeOutput, _inp: NodeInput, _silent: boolean): void {
    this.flowChanged = true;
  }

  /**
   * Reports a failing node callback through the flow's hooks and logger
   */
  reportError(node: Node, error: unknown): NodeError {
    const nodeError = createNodeError(node.id, node.title, error);
    this.flow.hooks.emit(FlowEventType.NODE_UPDATE_ERROR, node, nodeError);
    if (!this.flow.silentErrors) {
      this.flow.logger.error(`Error in node '${node.title}' (${node.id}): ${nodeError.message}`, nodeError);
    }
    return nodeError;
  }

  /**
   * Calls `updateEvent`, catching whatever it throws
   * @returns false if the callback failed
   */
  protected invokeNode(node: Node, inp: number): boolean {
    try {
      node.updateEvent(inp);
    } catch (error) {
      this.reportError(node, error);
      return false;
    }
    this.flow.hooks.emit(FlowEventType.NODE_UPDATED, node, inp);
    return true;
  }

  protected storeOutput(out: NodeOutput, value: unknown): void {
    out.value = value;
    this.flow.hooks.emit(FlowEventType.OUTPUT_UPDATED, out.node, out.index, value);
  }

  protected activate(out: NodeOutput, inp: NodeInput): void {
    this.flow.hooks.emit(FlowEventType.CONNECTION_ACTIVATED, out, inp);
  }
}
