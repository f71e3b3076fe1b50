import { FlowEventType } from '../types/flow-hooks';
import { PRODUCE_OUTPUT, PortConfig, PortDescriptor, PortDirection, PortKind } from '../types/port';
import type { NodeConfig, Serializable } from '../types/utils';
import { DataTypeError, FlowError } from '../utils/errors';
import type { Flow } from './flow';
import { NodeInput, NodeOutput, portConfigFromDescriptor } from './port';

/**
 * Constructor of a node type
 */
export type NodeType<T extends Node = Node> = new (flow: Flow, config?: NodeConfig) => T;

/**
 * Base class of all nodes.
 *
 * Subclasses declare their static ports through `initInputs`/`initOutputs`
 * and implement `updateEvent`. Every other hook is a no-op by default.
 *
 * @example
 * ```typescript
 * class SumNode extends Node {
 *   title = 'sum';
 *   initInputs = [{ label: 'a', allowedData: 'number' }, { label: 'b', allowedData: 'number' }];
 *   initOutputs = [{ label: 'sum', allowedData: 'number' }];
 *
 *   updateEvent(): void {
 *     this.setOutput(0, Number(this.input(0) ?? 0) + Number(this.input(1) ?? 0));
 *   }
 * }
 *
 * const sum = flow.createNode(SumNode);
 * ```
 */
export abstract class Node {
  public readonly id: number;

  /**
   * Id the node had in the data it was imported from
   */
  public prevId: number | undefined;

  public title: string = this.constructor.name;
  public tags: string[] = [];
  public version = '1.0';

  /**
   * Ports created when the node is set up by its flow
   */
  public initInputs: PortConfig[] = [];
  public initOutputs: PortConfig[] = [];

  /**
   * While set, `update()` calls are ignored
   */
  public blockUpdates = false;

  public readonly config: NodeConfig;

  private readonly inputPorts: NodeInput[] = [];
  private readonly outputPorts: NodeOutput[] = [];
  private portsReady = false;

  constructor(
    public readonly flow: Flow,
    config: NodeConfig = {}
  ) {
    this.id = flow.idCounter.next();
    this.config = config;
  }

  get inputs(): readonly NodeInput[] {
    return this.inputPorts;
  }

  get outputs(): readonly NodeOutput[] {
    return this.outputPorts;
  }

  /**
   * Type id under which the node's class is registered
   */
  get typeId(): string {
    return this.flow.registry?.typeIdOf(this.constructor) ?? this.constructor.name;
  }

  /**
   * Whether the node is driven once per player frame
   */
  get frameDriven(): boolean {
    return false;
  }

  /**
   * Whether a frame-driven node has completed its work
   */
  get frameFinished(): boolean {
    return false;
  }

  /**
   * Creates the static ports. Called by the flow once the subclass is constructed.
   */
  setupPorts(): void {
    if (this.portsReady) {
      return;
    }
    this.portsReady = true;
    this.initInputs.forEach(config => this.inputPorts.push(new NodeInput(this, config)));
    this.initOutputs.forEach(config => this.outputPorts.push(new NodeOutput(this, config)));
  }

  /**
   * Replaces all ports with exported ones
   * @throws FlowError if any port is connected
   */
  restorePorts(inputs: readonly PortDescriptor[], outputs: readonly PortDescriptor[]): void {
    if (this.anyInputConnected() || this.anyOutputConnected()) {
      throw new FlowError(`Cannot restore ports of connected node '${this.title}'`);
    }
    this.portsReady = true;
    this.inputPorts.splice(
      0,
      this.inputPorts.length,
      ...inputs.map(d => new NodeInput(this, portConfigFromDescriptor(d)))
    );
    this.outputPorts.splice(
      0,
      this.outputPorts.length,
      ...outputs.map(d => new NodeOutput(this, portConfigFromDescriptor(d)))
    );
  }

  // Executor-facing API

  /**
   * Requests an update through the flow's executor
   * @param inp Index of the input that triggered the update
   */
  update(inp: number = PRODUCE_OUTPUT): void {
    if (this.blockUpdates) {
      return;
    }
    this.flow.hooks.emit(FlowEventType.NODE_UPDATING, this, inp);
    this.flow.executor.updateNode(this, inp);
  }

  /**
   * Value present at a data input
   */
  input(index: number): unknown {
    const inp = this.inputAt(index);
    if (inp.kind !== PortKind.DATA) {
      throw new FlowError(`Input ${index} of '${this.title}' is not a data port`);
    }
    return this.flow.executor.input(inp);
  }

  /**
   * Sets the value of a data output
   * @throws DataTypeError if the value doesn't match the output's declared type
   */
  setOutput(index: number, value: unknown): void {
    const out = this.outputAt(index);
    if (out.kind !== PortKind.DATA) {
      throw new FlowError(`Output ${index} of '${this.title}' is not a data port`);
    }
    if (!this.flow.types.isValue(out.allowedData, value)) {
      throw new DataTypeError(
        `Value of type ${typeof value} rejected by output ${index} of '${this.title}' (${String(out.allowedData)})`
      );
    }
    this.flow.executor.setOutput(out, value);
  }

  /**
   * Fires an exec output
   */
  execOutput(index: number): void {
    const out = this.outputAt(index);
    if (out.kind !== PortKind.EXEC) {
      throw new FlowError(`Output ${index} of '${this.title}' is not an exec port`);
    }
    this.flow.executor.execOutput(out);
  }

  // Ports

  createInput(config: PortConfig = {}, insert?: number): NodeInput {
    this.flow.assertMutable('create input');
    const inp = new NodeInput(this, config);
    this.inputPorts.splice(insert ?? this.inputPorts.length, 0, inp);
    return inp;
  }

  createOutput(config: PortConfig = {}, insert?: number): NodeOutput {
    this.flow.assertMutable('create output');
    const out = new NodeOutput(this, config);
    this.outputPorts.splice(insert ?? this.outputPorts.length, 0, out);
    return out;
  }

  /**
   * Deletes an input, disconnecting it first
   */
  deleteInput(index: number): void {
    this.flow.assertMutable('delete input');
    const inp = this.inputAt(index);
    const out = this.flow.connectedOutput(inp);
    if (out) {
      this.flow.disconnectPorts(out, inp);
    }
    this.inputPorts.splice(index, 1);
  }

  /**
   * Deletes an output, disconnecting it first
   */
  deleteOutput(index: number): void {
    this.flow.assertMutable('delete output');
    const out = this.outputAt(index);
    [...this.flow.connectedInputs(out)].forEach(inp => this.flow.disconnectPorts(out, inp));
    this.outputPorts.splice(index, 1);
  }

  renameInput(index: number, label: string): void {
    this.inputAt(index).label = label;
  }

  renameOutput(index: number, label: string): void {
    this.outputAt(index).label = label;
  }

  inputConnected(index: number): boolean {
    return this.flow.connectedOutput(this.inputAt(index)) !== null;
  }

  outputConnected(index: number): boolean {
    return this.flow.connectedInputs(this.outputAt(index)).length > 0;
  }

  anyInputConnected(): boolean {
    return this.inputPorts.some(inp => this.flow.connectedOutput(inp) !== null);
  }

  anyOutputConnected(): boolean {
    return this.outputPorts.some(out => this.flow.connectedInputs(out).length > 0);
  }

  // State

  /**
   * State written by the structural export
   */
  getState(): Serializable {
    return null;
  }

  setState(_state: Serializable): void {}

  // Hooks

  /**
   * Reacts to new data or a trigger
   * @param inp Index of the triggering input, or PRODUCE_OUTPUT
   */
  abstract updateEvent(inp: number): void;

  /** Called after the node was placed in the flow */
  placeEvent(): void {}

  /** Called by a player before its first pass */
  init(): void {}

  /** Called by a player when pausing */
  pause(): void {}

  /** Called by a player when stopping */
  stop(): void {}

  /** Called before the node is removed from the flow */
  removeEvent(): void {}

  /** Called by a player once per frame on frame-driven nodes */
  frameUpdateEvent(): void {}

  toString(): string {
    return `${this.title}#${this.id}`;
  }

  private inputAt(index: number): NodeInput {
    const inp = this.inputPorts[index];
    if (!inp) {
      throw new FlowError(`Node '${this.title}' has no ${PortDirection.INPUT} ${index}`);
    }
    return inp;
  }

  private outputAt(index: number): NodeOutput {
    const out = this.outputPorts[index];
    if (!out) {
      throw new FlowError(`Node '${this.title}' has no ${PortDirection.OUTPUT} ${index}`);
    }
    return out;
  }
}

/**
 * Node evaluated once per player frame until it calls `finish()`
 */
export abstract class FrameNode extends Node {
  private finished = false;

  override get frameDriven(): boolean {
    return true;
  }

  override get frameFinished(): boolean {
    return this.finished;
  }

  /**
   * Subclasses overriding init must call super.init()
   */
  override init(): void {
    this.finished = false;
  }

  abstract override frameUpdateEvent(): void;

  /**
   * Marks the node's work as complete
   */
  protected finish(): void {
    this.finished = true;
  }
}
