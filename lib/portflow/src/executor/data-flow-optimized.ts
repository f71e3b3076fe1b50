import type { Node } from '../flow/node';
import type { NodeOutput } from '../flow/port';
import { FlowAlg } from '../types/flow-alg';
import { FlowEventType } from '../types/flow-hooks';
import { PRODUCE_OUTPUT } from '../types/port';
import { CycleDetectedError } from '../utils/errors';
import { DataFlowNaive } from './data-flow-naive';
import { collectReachable, countPredecessors, findCycleNodes } from './graph-utils';

/**
 * Bookkeeping of one triggered execution
 */
interface Execution {
  readonly root: Node;
  readonly waits: Map<Node, number>;
  readonly dirty: Map<Node, Set<NodeOutput>>;
  // first input each node received data on
  readonly pending: Map<Node, number>;
  current: Node | null;
}

/**
 * Data flow activating every connection at most once per triggered execution.
 *
 * A trigger (an explicit update or an output set from outside an execution)
 * plans the subgraph reachable from its node. Each node waits for all of its
 * reachable predecessors, then runs once, and its dirty outputs are pushed
 * along each edge exactly once. Topology is locked while an execution runs.
 */
export class DataFlowOptimized extends DataFlowNaive {
  override readonly mode = FlowAlg.DATA_OPT;

  // wait counts per root, valid until the topology changes
  private readonly plans = new Map<Node, ReadonlyMap<Node, number>>();
  private execution: Execution | null = null;
  private readonly followUps: Array<() => void> = [];

  override updateNode(node: Node, inp: number): void {
    if (this.execution) {
      this.followUps.push(() => this.run(node, true, inp));
      return;
    }
    this.run(node, true, inp);
    this.drainFollowUps();
  }

  override setOutput(out: NodeOutput, value: unknown): void {
    this.storeOutput(out, value);
    this.markDirty(out);
  }

  override execOutput(out: NodeOutput): void {
    this.markDirty(out);
  }

  /**
   * Whether an execution is in flight
   */
  get executing(): boolean {
    return this.execution !== null;
  }

  private markDirty(out: NodeOutput): void {
    const execution = this.execution;

    if (execution && execution.current === out.node) {
      this.dirtyOutputs(execution, out.node).add(out);
      return;
    }

    if (execution) {
      this.followUps.push(() => this.runFromOutput(out));
      return;
    }

    this.runFromOutput(out);
    this.drainFollowUps();
  }

  private runFromOutput(out: NodeOutput): void {
    this.run(out.node, false, PRODUCE_OUTPUT, out);
  }

  /**
   * Runs one execution rooted at `root`
   * @param invokeRoot Whether the root's callback runs, false for output triggers
   * @param seed Output already set on the root
   */
  private run(root: Node, invokeRoot: boolean, inp: number, seed?: NodeOutput): void {
    const waits = this.waitsFor(root);
    const execution: Execution = {
      root,
      waits: new Map(waits),
      dirty: new Map(),
      pending: new Map(),
      current: null,
    };
    if (seed) {
      this.dirtyOutputs(execution, root).add(seed);
    }

    this.execution = execution;
    this.flow.lockTopology();
    this.flow.hooks.emit(FlowEventType.EXECUTION_STARTED, root);

    try {
      if (invokeRoot) {
        execution.current = root;
        this.invokeNode(root, inp);
        execution.current = null;
      }
      this.drain(execution);
    } finally {
      this.execution = null;
      this.flow.unlockTopology();
      this.flow.hooks.emit(FlowEventType.EXECUTION_FINISHED, root);
    }
  }

  private drain(execution: Execution): void {
    const ready: Node[] = [execution.root];

    while (ready.length > 0) {
      const node = ready.shift();
      if (!node) {
        break;
      }

      if (node !== execution.root) {
        const inp = execution.pending.get(node);
        // nodes that received nothing still release their successors
        if (inp !== undefined && !node.blockUpdates) {
          this.flow.hooks.emit(FlowEventType.NODE_UPDATING, node, inp);
          execution.current = node;
          this.invokeNode(node, inp);
          execution.current = null;
        }
      }

      this.pushDirty(execution, node);

      for (const succ of this.flow.successors(node)) {
        const wait = execution.waits.get(succ);
        if (wait === undefined) {
          continue;
        }
        execution.waits.set(succ, wait - 1);
        if (wait - 1 === 0) {
          ready.push(succ);
        }
      }
    }
  }

  private pushDirty(execution: Execution, node: Node): void {
    const outputs = execution.dirty.get(node);
    if (!outputs) {
      return;
    }
    execution.dirty.delete(node);

    for (const out of node.outputs) {
      if (!outputs.has(out)) {
        continue;
      }
      for (const inp of this.flow.connectedInputs(out)) {
        this.activate(out, inp);
        if (!execution.pending.has(inp.node)) {
          execution.pending.set(inp.node, inp.index);
        }
      }
    }
  }

  private waitsFor(root: Node): ReadonlyMap<Node, number> {
    if (this.flowChanged) {
      this.plans.clear();
      this.flowChanged = false;
    }

    const cached = this.plans.get(root);
    if (cached) {
      return cached;
    }

    const reachable = collectReachable(this.flow, [root]);
    const waits = countPredecessors(this.flow, reachable);
    const cycle = findCycleNodes(this.flow, reachable, waits);
    if (cycle.length > 0) {
      throw new CycleDetectedError(cycle.map(node => node.id));
    }

    this.plans.set(root, waits);
    return waits;
  }

  private dirtyOutputs(execution: Execution, node: Node): Set<NodeOutput> {
    let outputs = execution.dirty.get(node);
    if (!outputs) {
      outputs = new Set();
      execution.dirty.set(node, outputs);
    }
    return outputs;
  }

  private drainFollowUps(): void {
    while (this.followUps.length > 0) {
      const next = this.followUps.shift();
      next?.();
    }
  }
}
