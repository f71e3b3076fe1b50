import { defaultIdCounter, IdCounter } from '../core/id-counter';
import { HookManager } from '../core/hook-manager';
import { createDefaultTypeRegistry, DataTypeRegistry } from '../core/type-registry';
import { executorFromFlowAlg } from '../executor';
import type { FlowExecutor } from '../executor/flow-executor';
import type { GraphPlayer } from '../player/graph-player';
import type { NodeRegistry } from '../session/registry';
import { ConnValidType } from '../types/connection';
import { FlowAlg, parseFlowAlg } from '../types/flow-alg';
import { FlowEventHandlers, FlowEventType } from '../types/flow-hooks';
import type { IFlowOptions } from '../types/flow-options';
import { GraphState } from '../types/graph-state';
import type { ILogger } from '../types/logger';
import type { NodeConfig, UnsubscribeFn } from '../types/utils';
import { FlowError, TopologyLockedError } from '../utils/errors';
import { LoggerManager } from '../utils/logging';
import type { Node, NodeType } from './node';
import { checkValidConn, NodeInput, NodeOutput, NodePort } from './port';

/**
 * Directed edge from an output to an input
 */
export type Connection = readonly [NodeOutput, NodeInput];

/**
 * Connection expressed through nodes and port indices
 */
export interface ConnectionInfo {
  readonly outNode: Node;
  readonly outIndex: number;
  readonly inpNode: Node;
  readonly inpIndex: number;
}

export const DEFAULT_MAX_PULL_DEPTH = 256;

/**
 * Graph container of nodes and connections.
 *
 * All data and trigger propagation is delegated to the active executor,
 * which is selected through the algorithm mode.
 */
export class Flow {
  public title: string;
  public readonly hooks = new HookManager<FlowEventHandlers>();
  public readonly logger: ILogger;
  public readonly types: DataTypeRegistry;
  public readonly idCounter: IdCounter;
  public readonly registry: NodeRegistry | undefined;
  public readonly silentErrors: boolean;
  public readonly maxPullDepth: number;

  private readonly nodeList: Node[] = [];
  private readonly graphAdj = new Map<NodeOutput, NodeInput[]>();
  private readonly graphAdjRev = new Map<NodeInput, NodeOutput>();
  // one entry per connection, so a successor may appear several times
  private readonly nodeSuccessors = new Map<Node, Node[]>();

  private currentExecutor: FlowExecutor;
  private algMode: FlowAlg;
  private topologyLocks = 0;
  private attachedPlayer: GraphPlayer | null = null;

  constructor(title = 'flow', options: IFlowOptions = {}) {
    this.title = title;
    this.logger = options.logger ?? LoggerManager.getInstance().getLogger();
    this.types = options.typeRegistry ?? createDefaultTypeRegistry();
    this.idCounter = options.idCounter ?? defaultIdCounter;
    this.registry = options.registry;
    this.silentErrors = options.silentErrors ?? false;
    this.maxPullDepth = options.maxPullDepth ?? DEFAULT_MAX_PULL_DEPTH;
    this.algMode = options.algorithmMode ?? FlowAlg.DATA;
    this.currentExecutor = executorFromFlowAlg(this.algMode, this);
  }

  get nodes(): readonly Node[] {
    return this.nodeList;
  }

  get executor(): FlowExecutor {
    return this.currentExecutor;
  }

  get algorithmMode(): FlowAlg {
    return this.algMode;
  }

  get player(): GraphPlayer | null {
    return this.attachedPlayer;
  }

  /**
   * Attaches a player, stopping and detaching the previous one
   */
  set player(player: GraphPlayer | null) {
    if (this.attachedPlayer === player) {
      return;
    }
    this.assertMutable('replace player');
    const previous = this.attachedPlayer;
    if (previous && previous.state !== GraphState.STOPPED) {
      previous.stop();
    }
    this.attachedPlayer = player;
    previous?.bind(null);
    player?.bind(this);
  }

  /**
   * Registers handler for a flow event
   */
  on<K extends FlowEventType>(
    eventType: K,
    handler: FlowEventHandlers[K],
    priority?: number
  ): UnsubscribeFn {
    return this.hooks.on(eventType, handler, priority);
  }

  /**
   * Switches the algorithm mode, replacing the executor.
   * Refused while a player owns the flow.
   * @returns true if the mode is active afterwards
   */
  setAlgorithmMode(mode: FlowAlg | string): boolean {
    const parsed = typeof mode === 'string' ? parseFlowAlg(mode) : mode;
    if (parsed === undefined) {
      this.logger.warn(`Unknown algorithm mode '${String(mode)}'`);
      return false;
    }
    if (this.attachedPlayer && this.attachedPlayer.state !== GraphState.STOPPED) {
      this.logger.warn(`Cannot change algorithm mode of '${this.title}' while its player is active`);
      return false;
    }
    this.assertMutable('change algorithm mode');
    if (parsed === this.algMode) {
      return true;
    }

    this.algMode = parsed;
    this.currentExecutor = executorFromFlowAlg(parsed, this);
    this.hooks.emit(FlowEventType.ALGORITHM_MODE_CHANGED, parsed);
    this.logger.logEvent('flow', 'algorithmModeChanged', { flow: this.title, mode: parsed });
    return true;
  }

  /**
   * Replaces the executor without changing the algorithm mode
   * @returns The previous executor
   */
  swapExecutor(executor: FlowExecutor): FlowExecutor {
    const previous = this.currentExecutor;
    executor.reset();
    this.currentExecutor = executor;
    return previous;
  }

  // Nodes

  /**
   * Creates a node of the given type and places it in the flow
   * @param prepare Runs after the ports are set up, before placement
   */
  createNode<T extends Node>(type: NodeType<T>, config?: NodeConfig, prepare?: (node: T) => void): T {
    if (this.registry && this.registry.typeIdOf(type) === undefined) {
      throw new FlowError(`Node type '${type.name}' is not registered`);
    }
    const node = new type(this, config);
    node.setupPorts();
    prepare?.(node);
    this.hooks.emit(FlowEventType.NODE_CREATED, node);
    this.addNode(node);
    return node;
  }

  /**
   * Places a node, e.g. one removed before. Runs its `placeEvent`.
   */
  addNode(node: Node): void {
    this.assertMutable('add node');
    if (node.flow !== this) {
      throw new FlowError(`Node '${node.title}' belongs to another flow`);
    }
    if (this.hasNode(node)) {
      throw new FlowError(`Node '${node.title}' is already placed`);
    }

    node.setupPorts();
    this.nodeList.push(node);
    this.nodeSuccessors.set(node, []);
    this.runNodeHook(node, () => node.placeEvent());
    this.hooks.emit(FlowEventType.NODE_ADDED, node);
    this.logger.logEvent('flow', 'nodeAdded', { flow: this.title, node: node.id, title: node.title });
  }

  /**
   * Removes a node without destroying it. Incident connections are
   * disconnected silently and returned, so they can be restored.
   */
  removeNode(node: Node): Connection[] {
    this.assertMutable('remove node');
    this.assertPlaced(node);

    const removed: Connection[] = [];
    node.inputs.forEach(inp => {
      const out = this.graphAdjRev.get(inp);
      if (out) {
        removed.push([out, inp]);
      }
    });
    node.outputs.forEach(out => {
      this.connectedInputs(out).forEach(inp => removed.push([out, inp]));
    });
    removed.forEach(([out, inp]) => this.removeConnection(out, inp, true));

    this.runNodeHook(node, () => node.removeEvent());
    this.nodeList.splice(this.nodeList.indexOf(node), 1);
    this.nodeSuccessors.delete(node);
    this.hooks.emit(FlowEventType.NODE_REMOVED, node);
    this.logger.logEvent('flow', 'nodeRemoved', { flow: this.title, node: node.id });
    return removed;
  }

  hasNode(node: Node): boolean {
    return this.nodeSuccessors.has(node);
  }

  /**
   * Distinct nodes fed by the node's outputs
   */
  successors(node: Node): Node[] {
    return [...new Set(this.nodeSuccessors.get(node) ?? [])];
  }

  /**
   * Distinct nodes feeding the node's inputs
   */
  predecessors(node: Node): Node[] {
    const result = new Set<Node>();
    node.inputs.forEach(inp => {
      const out = this.graphAdjRev.get(inp);
      if (out) {
        result.add(out.node);
      }
    });
    return [...result];
  }

  // Connections

  connectedInputs(out: NodeOutput): readonly NodeInput[] {
    return this.graphAdj.get(out) ?? [];
  }

  connectedOutput(inp: NodeInput): NodeOutput | null {
    return this.graphAdjRev.get(inp) ?? null;
  }

  /**
   * All connections, ordered by source node, output and insertion
   */
  connections(): Connection[] {
    const result: Connection[] = [];
    this.nodeList.forEach(node =>
      node.outputs.forEach(out =>
        this.connectedInputs(out).forEach(inp => result.push([out, inp]))
      )
    );
    return result;
  }

  connectionInfo(out: NodeOutput, inp: NodeInput): ConnectionInfo {
    return { outNode: out.node, outIndex: out.index, inpNode: inp.node, inpIndex: inp.index };
  }

  /**
   * Checks the port-level rules of a connection, ignoring existing connections
   */
  checkConnectionValidity(out: NodePort, inp: NodePort): ConnValidType {
    const result = checkValidConn(out, inp, this.types);
    this.hooks.emit(FlowEventType.CONNECTION_REQUEST_VALID, result);
    return result;
  }

  /**
   * Like {@link checkConnectionValidity}, also rejecting connected ports and taken inputs
   */
  canPortsConnect(out: NodePort, inp: NodePort): ConnValidType {
    let result = checkValidConn(out, inp, this.types);

    if (result === ConnValidType.VALID && out instanceof NodeOutput && inp instanceof NodeInput) {
      if (this.connectedInputs(out).includes(inp)) {
        result = ConnValidType.ALREADY_CONNECTED;
      } else if (this.graphAdjRev.has(inp)) {
        result = ConnValidType.INPUT_TAKEN;
      }
    }

    this.hooks.emit(FlowEventType.CONNECTION_REQUEST_VALID, result);
    return result;
  }

  canPortsDisconnect(out: NodePort, inp: NodePort): ConnValidType {
    const connected =
      out instanceof NodeOutput &&
      inp instanceof NodeInput &&
      this.connectedInputs(out).includes(inp);
    const result = connected
      ? checkValidConn(out, inp, this.types)
      : ConnValidType.ALREADY_DISCONNECTED;

    this.hooks.emit(FlowEventType.CONNECTION_REQUEST_VALID, result);
    return result;
  }

  /**
   * Connects two ports. Invalid requests are answered with a code, not an error.
   * @param silent Skip the executor's reaction (e.g. updating the target node)
   * @throws FlowError if a port's node is not placed in this flow
   * @throws TopologyLockedError during an execution
   */
  connectPorts(out: NodePort, inp: NodePort, silent = false): ConnValidType {
    this.assertPlaced(out.node);
    this.assertPlaced(inp.node);
    this.assertMutable('connect ports');

    const result = this.canPortsConnect(out, inp);
    if (result !== ConnValidType.VALID || !(out instanceof NodeOutput) || !(inp instanceof NodeInput)) {
      this.logger.debug(`Invalid connect request ${out.toString()} -> ${inp.toString()}: ${result}`);
      return result;
    }

    this.addConnection(out, inp, silent);
    return result;
  }

  disconnectPorts(out: NodePort, inp: NodePort, silent = false): ConnValidType {
    this.assertPlaced(out.node);
    this.assertPlaced(inp.node);
    this.assertMutable('disconnect ports');

    const result = this.canPortsDisconnect(out, inp);
    if (result !== ConnValidType.VALID || !(out instanceof NodeOutput) || !(inp instanceof NodeInput)) {
      this.logger.debug(`Invalid disconnect request ${out.toString()} -> ${inp.toString()}: ${result}`);
      return result;
    }

    this.removeConnection(out, inp, silent);
    return result;
  }

  connectNodes(outNode: Node, outIndex: number, inpNode: Node, inpIndex: number, silent = false): ConnValidType {
    return this.connectPorts(this.outputOf(outNode, outIndex), this.inputOf(inpNode, inpIndex), silent);
  }

  disconnectNodes(outNode: Node, outIndex: number, inpNode: Node, inpIndex: number, silent = false): ConnValidType {
    return this.disconnectPorts(this.outputOf(outNode, outIndex), this.inputOf(inpNode, inpIndex), silent);
  }

  // Topology lock

  /**
   * Forbids topology changes until the matching {@link unlockTopology}
   */
  lockTopology(): void {
    this.topologyLocks += 1;
  }

  unlockTopology(): void {
    this.topologyLocks = Math.max(0, this.topologyLocks - 1);
  }

  get topologyLocked(): boolean {
    return this.topologyLocks > 0;
  }

  /**
   * @throws TopologyLockedError while the topology is locked
   */
  assertMutable(operation: string): void {
    if (this.topologyLocks > 0) {
      throw new TopologyLockedError(operation);
    }
  }

  private addConnection(out: NodeOutput, inp: NodeInput, silent: boolean): void {
    const targets = this.graphAdj.get(out);
    if (targets) {
      targets.push(inp);
    } else {
      this.graphAdj.set(out, [inp]);
    }
    this.graphAdjRev.set(inp, out);
    this.nodeSuccessors.get(out.node)?.push(inp.node);

    this.currentExecutor.connAdded(out, inp, silent);
    this.hooks.emit(FlowEventType.CONNECTION_ADDED, out, inp);
  }

  private removeConnection(out: NodeOutput, inp: NodeInput, silent: boolean): void {
    const targets = this.graphAdj.get(out) ?? [];
    targets.splice(targets.indexOf(inp), 1);
    if (targets.length === 0) {
      this.graphAdj.delete(out);
    }
    this.graphAdjRev.delete(inp);

    const successors = this.nodeSuccessors.get(out.node) ?? [];
    successors.splice(successors.indexOf(inp.node), 1);

    this.currentExecutor.connRemoved(out, inp, silent);
    this.hooks.emit(FlowEventType.CONNECTION_REMOVED, out, inp);
  }

  private runNodeHook(node: Node, hook: () => void): void {
    try {
      hook();
    } catch (error) {
      this.currentExecutor.reportError(node, error);
    }
  }

  private assertPlaced(node: Node): void {
    if (!this.hasNode(node)) {
      throw new FlowError(`Node '${node.title}' is not placed in flow '${this.title}'`);
    }
  }

  private outputOf(node: Node, index: number): NodeOutput {
    const out = node.outputs[index];
    if (!out) {
      throw new FlowError(`Node '${node.title}' has no output ${index}`);
    }
    return out;
  }

  private inputOf(node: Node, index: number): NodeInput {
    const inp = node.inputs[index];
    if (!inp) {
      throw new FlowError(`Node '${node.title}' has no input ${index}`);
    }
    return inp;
  }
}
