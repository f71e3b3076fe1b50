import { interval, Subscription } from 'rxjs';
import { collectReachable, countPredecessors } from '../executor/graph-utils';
import type { FlowExecutor } from '../executor/flow-executor';
import { ManualFlow } from '../executor/manual-flow';
import type { Flow } from '../flow/flow';
import type { Node } from '../flow/node';
import { GraphActionResponse, GraphActionResult, GraphState } from '../types/graph-state';
import { PRODUCE_OUTPUT } from '../types/port';
import { GraphPlayer } from './graph-player';

/**
 * Nodes taking part in a run
 */
interface RunNodes {
  readonly active: readonly Node[];
  readonly roots: readonly Node[];
  readonly frameNodes: readonly Node[];
}

/**
 * Default player.
 *
 * `play()` initializes every active node (one with a connected port or
 * frame-driven) and evaluates the flow once from its roots, each node
 * running once per pass after all of its predecessors. With frame-driven
 * nodes it then ticks at the target frame rate: each tick updates the
 * frame nodes and runs a pass from those that produced output.
 */
export class FlowPlayer extends GraphPlayer {
  private nodes: RunNodes = { active: [], roots: [], frameNodes: [] };
  private manual: ManualFlow | null = null;
  private previousExecutor: FlowExecutor | null = null;
  private ticker: Subscription | null = null;
  private busy = false;
  private stopRequested = false;

  play(): GraphActionResult {
    const flow = this.flow;
    if (!flow) {
      return this.result(GraphActionResponse.NO_GRAPH, 'No flow attached to the player');
    }
    if (this.state !== GraphState.STOPPED) {
      return this.result(GraphActionResponse.NOT_ALLOWED, `Player is already ${this.state}`);
    }
    if (flow.topologyLocked) {
      return this.result(GraphActionResponse.NOT_ALLOWED, 'An execution is in flight');
    }

    this.nodes = this.gatherNodes(flow);
    const manual = new ManualFlow(flow);
    this.manual = manual;
    this.previousExecutor = flow.swapExecutor(manual);
    this.stopRequested = false;
    this.graphTime.start();
    this.setState(GraphState.PLAYING);

    this.busy = true;
    try {
      this.nodes.active.forEach(node => this.runHook(manual, node, () => node.init()));
      this.runPass(flow, manual, this.nodes.roots, true);
    } finally {
      this.busy = false;
    }

    if (this.stopRequested || this.nodes.frameNodes.length === 0) {
      this.finalize();
      return this.result(GraphActionResponse.SUCCESS, `Flow '${flow.title}' evaluated`);
    }

    this.startTicker();
    return this.result(GraphActionResponse.SUCCESS, `Flow '${flow.title}' playing`);
  }

  pause(): GraphActionResult {
    if (!this.flow) {
      return this.result(GraphActionResponse.NO_GRAPH, 'No flow attached to the player');
    }
    if (this.state !== GraphState.PLAYING) {
      return this.result(GraphActionResponse.NOT_ALLOWED, `Cannot pause while ${this.state}`);
    }
    if (this.frameNodes(this.flow).length === 0) {
      return this.result(GraphActionResponse.NOT_ALLOWED, 'Flow has no frame-driven nodes');
    }

    this.stopTicker();
    const manual = this.manual;
    if (manual) {
      this.nodes.active.forEach(node => this.runHook(manual, node, () => node.pause()));
    }
    this.setState(GraphState.PAUSED);
    return this.result(GraphActionResponse.SUCCESS, 'Paused');
  }

  resume(): GraphActionResult {
    if (!this.flow) {
      return this.result(GraphActionResponse.NO_GRAPH, 'No flow attached to the player');
    }
    if (this.state !== GraphState.PAUSED) {
      return this.result(GraphActionResponse.NOT_ALLOWED, `Cannot resume while ${this.state}`);
    }

    this.graphTime.resume();
    this.setState(GraphState.PLAYING);
    this.startTicker();
    return this.result(GraphActionResponse.SUCCESS, 'Resumed');
  }

  stop(): GraphActionResult {
    if (!this.flow) {
      return this.result(GraphActionResponse.NO_GRAPH, 'No flow attached to the player');
    }
    if (this.state === GraphState.STOPPED) {
      return this.result(GraphActionResponse.NOT_ALLOWED, 'Player is already stopped');
    }
    if (this.busy) {
      this.stopRequested = true;
      return this.result(GraphActionResponse.SUCCESS, 'Stop requested');
    }

    this.finalize();
    return this.result(GraphActionResponse.SUCCESS, 'Stopped');
  }

  private gatherNodes(flow: Flow): RunNodes {
    const active = flow.nodes.filter(
      node => node.frameDriven || node.anyInputConnected() || node.anyOutputConnected()
    );
    return {
      active,
      roots: active.filter(node => !node.anyInputConnected()),
      frameNodes: active.filter(node => node.frameDriven),
    };
  }

  private frameNodes(flow: Flow): Node[] {
    return flow.nodes.filter(node => node.frameDriven);
  }

  private startTicker(): void {
    this.stopTicker();
    this.ticker = interval(this.graphTime.frameDuration() * 1000, this.scheduler).subscribe(() =>
      this.tick()
    );
  }

  private stopTicker(): void {
    this.ticker?.unsubscribe();
    this.ticker = null;
  }

  private tick(): void {
    const flow = this.flow;
    const manual = this.manual;
    if (!flow || !manual || this.state !== GraphState.PLAYING) {
      return;
    }

    // frame nodes may have been added or removed since the last tick
    const frameNodes = this.frameNodes(flow);

    this.busy = true;
    try {
      this.graphTime.tick();
      frameNodes
        .filter(node => !node.frameFinished)
        .forEach(node => this.runHook(manual, node, () => node.frameUpdateEvent()));

      const seeds = flow.nodes.filter(node => manual.hasUpdatedOutputs(node));
      this.runPass(flow, manual, seeds, false);
    } finally {
      this.busy = false;
    }

    if (this.stopRequested || frameNodes.every(node => node.frameFinished)) {
      this.finalize();
    }
  }

  /**
   * Runs every node reachable from the seeds once, after all of its
   * predecessors in the pass. Seeds run with PRODUCE_OUTPUT when
   * `invokeSeeds` is set, other nodes only when one of their inputs
   * received data during the pass.
   */
  private runPass(flow: Flow, manual: ManualFlow, seeds: readonly Node[], invokeSeeds: boolean): void {
    const seedSet = new Set(seeds);
    const scope = collectReachable(flow, seeds);
    const waits = countPredecessors(flow, scope);
    const ready = [...scope].filter(node => waits.get(node) === 0);

    flow.lockTopology();
    try {
      while (ready.length > 0) {
        const node = ready.shift();
        if (!node) {
          break;
        }

        if (invokeSeeds && seedSet.has(node)) {
          node.update(PRODUCE_OUTPUT);
        } else {
          const inp = node.inputs.findIndex(input => manual.inputUpdated(input));
          if (inp !== -1) {
            node.update(inp);
          }
        }

        for (const succ of flow.successors(node)) {
          const wait = waits.get(succ);
          if (wait === undefined) {
            continue;
          }
          waits.set(succ, wait - 1);
          if (wait - 1 === 0) {
            ready.push(succ);
          }
        }
      }
    } finally {
      flow.unlockTopology();
      manual.clearUpdates();
    }

    const stuck = [...waits.values()].filter(wait => wait > 0).length;
    if (stuck > 0) {
      this.logger.warn(`${stuck} node(s) on a cycle were skipped in flow '${flow.title}'`);
    }
  }

  private runHook(manual: ManualFlow, node: Node, hook: () => void): void {
    try {
      hook();
    } catch (error) {
      manual.reportError(node, error);
    }
  }

  private finalize(): void {
    this.stopTicker();
    this.stopRequested = false;

    const flow = this.flow;
    const manual = this.manual;
    if (manual) {
      this.nodes.active.forEach(node => this.runHook(manual, node, () => node.stop()));
    }
    if (flow && this.previousExecutor) {
      flow.swapExecutor(this.previousExecutor);
    }
    this.previousExecutor = null;
    this.manual = null;

    this.setState(GraphState.STOPPED);
  }
}
