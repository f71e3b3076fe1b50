import { defaultIdCounter, IdCounter } from '../core/id-counter';
import { HookManager } from '../core/hook-manager';
import type { DataTypeRegistry } from '../core/type-registry';
import { Flow } from '../flow/flow';
import { exportFlowStructure, FlowStructure, importFlowStructure } from '../flow/flow-structure';
import type { NodeType } from '../flow/node';
import { FlowPlayer } from '../player/flow-player';
import type { GraphPlayer } from '../player/graph-player';
import type { IFlowOptions, IPlayerOptions } from '../types/flow-options';
import { GraphActionResponse, GraphActionResult, GraphState } from '../types/graph-state';
import type { ILogger } from '../types/logger';
import { SessionEventHandlers, SessionEventType } from '../types/session-hooks';
import type { UnsubscribeFn } from '../types/utils';
import { FlowError } from '../utils/errors';
import { LoggerManager } from '../utils/logging';
import { NodeRegistry } from './registry';

export interface SessionOptions {
  logger?: ILogger;
  typeRegistry?: DataTypeRegistry;
  idCounter?: IdCounter;
  /**
   * Options of the player created for every flow
   */
  player?: IPlayerOptions;
}

/**
 * Exported form of a session
 */
export interface SessionStructure {
  readonly flows: readonly FlowStructure[];
}

type PlayerAction = 'play' | 'pause' | 'resume' | 'stop';

/**
 * Top-level container of flows sharing a node registry and an id counter.
 * Every flow gets its own FlowPlayer, addressed by the flow's title.
 */
export class Session {
  readonly registry = new NodeRegistry();
  readonly idCounter: IdCounter;
  readonly hooks = new HookManager<SessionEventHandlers>();

  private readonly flowsByTitle = new Map<string, Flow>();
  private readonly logger: ILogger;

  constructor(private readonly options: SessionOptions = {}) {
    this.idCounter = options.idCounter ?? defaultIdCounter;
    this.logger = options.logger ?? LoggerManager.getInstance().getLogger();
  }

  get flows(): ReadonlyMap<string, Flow> {
    return this.flowsByTitle;
  }

  on<K extends SessionEventType>(eventType: K, handler: SessionEventHandlers[K]): UnsubscribeFn {
    return this.hooks.on(eventType, handler);
  }

  registerNodeTypes(types: Iterable<NodeType>): void {
    this.registry.registerAll(types);
  }

  /**
   * Creates a flow with a FlowPlayer attached
   * @throws FlowError if the title is taken
   */
  createFlow(title: string, options: IFlowOptions = {}): Flow {
    if (this.flowsByTitle.has(title)) {
      throw new FlowError(`Flow '${title}' already exists`);
    }

    const flow = new Flow(title, {
      logger: this.options.logger,
      typeRegistry: this.options.typeRegistry,
      ...options,
      idCounter: this.idCounter,
      registry: this.registry,
    });
    flow.player = new FlowPlayer(this.options.player);

    this.flowsByTitle.set(title, flow);
    this.hooks.emit(SessionEventType.FLOW_CREATED, flow);
    this.logger.logEvent('session', 'flowCreated', { flow: title });
    return flow;
  }

  /**
   * @returns false if the flow doesn't exist or the new title is taken
   */
  renameFlow(title: string, newTitle: string): boolean {
    const flow = this.flowsByTitle.get(title);
    if (!flow || this.flowsByTitle.has(newTitle)) {
      return false;
    }
    this.flowsByTitle.delete(title);
    flow.title = newTitle;
    this.flowsByTitle.set(newTitle, flow);
    this.hooks.emit(SessionEventType.FLOW_RENAMED, flow, title);
    return true;
  }

  /**
   * Stops the flow's player and forgets the flow
   */
  deleteFlow(title: string): boolean {
    const flow = this.flowsByTitle.get(title);
    if (!flow) {
      return false;
    }
    const player = flow.player;
    if (player && player.state !== GraphState.STOPPED) {
      player.stop();
    }
    this.flowsByTitle.delete(title);
    this.hooks.emit(SessionEventType.FLOW_DELETED, flow);
    this.logger.logEvent('session', 'flowDeleted', { flow: title });
    return true;
  }

  flow(title: string): Flow | undefined {
    return this.flowsByTitle.get(title);
  }

  graphPlayer(title: string): GraphPlayer | null {
    return this.flowsByTitle.get(title)?.player ?? null;
  }

  playFlow(title: string): GraphActionResult {
    return this.playerAction(title, 'play');
  }

  pauseFlow(title: string): GraphActionResult {
    return this.playerAction(title, 'pause');
  }

  resumeFlow(title: string): GraphActionResult {
    return this.playerAction(title, 'resume');
  }

  stopFlow(title: string): GraphActionResult {
    return this.playerAction(title, 'stop');
  }

  /**
   * Stops every player
   */
  shutdown(): void {
    this.flowsByTitle.forEach(flow => {
      const player = flow.player;
      if (player && player.state !== GraphState.STOPPED) {
        player.stop();
      }
    });
    this.logger.logEvent('session', 'shutdown', { flows: this.flowsByTitle.size });
  }

  exportStructure(): SessionStructure {
    return { flows: [...this.flowsByTitle.values()].map(flow => exportFlowStructure(flow)) };
  }

  /**
   * Creates a flow for every exported one
   * @returns The created flows
   */
  importStructure(data: SessionStructure): Flow[] {
    return data.flows.map(flowData => {
      const flow = this.createFlow(flowData.title);
      importFlowStructure(flow, flowData);
      return flow;
    });
  }

  private playerAction(title: string, action: PlayerAction): GraphActionResult {
    const player = this.graphPlayer(title);
    if (!player) {
      return { response: GraphActionResponse.NO_GRAPH, message: `No flow named '${title}'` };
    }
    switch (action) {
      case 'play':
        return player.play();
      case 'pause':
        return player.pause();
      case 'resume':
        return player.resume();
      case 'stop':
        return player.stop();
    }
  }
}
