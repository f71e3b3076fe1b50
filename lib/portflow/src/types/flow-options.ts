import type { SchedulerLike } from 'rxjs';
import type { DataTypeRegistry } from '../core/type-registry';
import type { IdCounter } from '../core/id-counter';
import type { NodeRegistry } from '../session/registry';
import type { FlowAlg } from './flow-alg';
import type { ILogger } from './logger';

/**
 * Options for flow initialization
 */
export interface IFlowOptions {
  /**
   * Initial algorithm mode. Defaults to naive data flow.
   */
  algorithmMode?: FlowAlg;

  /**
   * Flow logger. Falls back to the logger held by LoggerManager.
   */
  logger?: ILogger;

  /**
   * Don't log node callback errors (they are still emitted as hooks)
   */
  silentErrors?: boolean;

  /**
   * Registry resolving the type tags of ports
   */
  typeRegistry?: DataTypeRegistry;

  /**
   * Counter handing out node ids
   */
  idCounter?: IdCounter;

  /**
   * Maximum nesting of pull requests in exec mode
   */
  maxPullDepth?: number;

  /**
   * Node types known to the flow, used to name types in the structural export
   * and to recreate nodes on import
   */
  registry?: NodeRegistry;
}

/**
 * Options for graph players
 */
export interface IPlayerOptions {
  /**
   * Target frame rate of the tick loop
   */
  frames?: number;

  /**
   * Scheduler the tick loop runs on
   */
  scheduler?: SchedulerLike;

  /**
   * Millisecond timestamp source used for frame timing
   */
  clock?: () => number;
}
