import type { Flow } from '../flow/flow';
import type { Node, NodeType } from '../flow/node';
import type { ConnValidType } from '../types/connection';
import type { IFlowOptions, IPlayerOptions } from '../types/flow-options';
import type { NodeConfig } from '../types/utils';

/**
 * Node declared through the build API
 */
export interface NodeDefinition {
  /** Key used by connection definitions */
  readonly key: string;
  /** Type id of a registered node type */
  readonly type: string;
  readonly config?: NodeConfig;
  readonly title?: string;
}

/**
 * [source key, output index, target key, input index]
 */
export type ConnectionDefinition = readonly [string, number, string, number];

/**
 * Immutable description of a flow, transformed by operators
 */
export interface FlowDefinition {
  readonly title: string;
  readonly options: IFlowOptions;
  readonly nodeTypes: ReadonlyMap<string, NodeType>;
  readonly nodes: readonly NodeDefinition[];
  readonly connections: readonly ConnectionDefinition[];
  readonly player?: IPlayerOptions;
}

/**
 * Flow operator function
 */
export interface FlowOperator {
  (definition: FlowDefinition): FlowDefinition;
}

/**
 * Flow created from a definition
 */
export interface BuiltFlow {
  readonly flow: Flow;
  readonly nodes: ReadonlyMap<string, Node>;
  /** Result of each connection definition, in order */
  readonly connections: readonly ConnValidType[];
  /**
   * Node created for a key
   * @throws Error if the key is unknown
   */
  node(key: string): Node;
}
