import type { NodeType } from '../flow/node';
import type { ConnectionDefinition, FlowOperator, NodeDefinition } from './operator-types';

/**
 * Node types, nodes and connections of a flow
 */
export interface NodesConfig {
  /**
   * Node types used by the nodes. An array registers each class under its name.
   */
  nodeTypes?: readonly NodeType[] | Readonly<Record<string, NodeType>>;

  /**
   * Nodes to create, in order
   */
  nodes?: readonly NodeDefinition[];

  /**
   * Connections between node keys, made once all nodes exist
   */
  connections?: readonly ConnectionDefinition[];
}

/**
 * Unified operator for node types, nodes and connections
 * @throws Error if config is empty or inconsistent
 */
export function withNodesConfig(config: NodesConfig): FlowOperator {
  const hasTypes = config.nodeTypes !== undefined;
  const hasNodes = config.nodes !== undefined;
  const hasConnections = config.connections !== undefined;

  if (!hasTypes && !hasNodes && !hasConnections) {
    throw new Error(
      'withNodesConfig: at least one of nodeTypes, nodes, or connections must be provided'
    );
  }

  // Validate that node types are provided if nodes are specified
  if (hasNodes && !hasTypes) {
    throw new Error('withNodesConfig: nodeTypes must be provided when nodes are specified');
  }

  // Validate that nodes are provided if connections are specified
  if (hasConnections && !hasNodes) {
    throw new Error('withNodesConfig: nodes must be provided when connections are specified');
  }

  const types = config.nodeTypes ?? {};
  const entries: Array<[string, NodeType]> = isTypeList(types)
    ? types.map((type): [string, NodeType] => [type.name, type])
    : Object.entries(types);

  return definition => {
    const nodeTypes = new Map(definition.nodeTypes);
    entries.forEach(([typeId, type]) => nodeTypes.set(typeId, type));

    return {
      ...definition,
      nodeTypes,
      nodes: [...definition.nodes, ...(config.nodes ?? [])],
      connections: [...definition.connections, ...(config.connections ?? [])],
    };
  };
}

function isTypeList(
  types: readonly NodeType[] | Readonly<Record<string, NodeType>>
): types is readonly NodeType[] {
  return Array.isArray(types);
}
