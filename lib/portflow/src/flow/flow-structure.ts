import { IdRemap } from '../core/id-counter';
import type { NodeRegistry } from '../session/registry';
import type { ConnectionTuple, ConnValidType } from '../types/connection';
import type { FlowAlg } from '../types/flow-alg';
import type { PortDescriptor } from '../types/port';
import type { Serializable } from '../types/utils';
import { FlowError } from '../utils/errors';
import type { Flow } from './flow';
import type { Node } from './node';

/**
 * Exported form of a node
 */
export interface NodeStructure {
  readonly id: number;
  readonly typeId: string;
  readonly title: string;
  readonly state: Serializable;
  readonly inputs: readonly PortDescriptor[];
  readonly outputs: readonly PortDescriptor[];
}

/**
 * Exported form of a flow. Nodes keep the flow's order, connections
 * address them by position.
 */
export interface FlowStructure {
  readonly title: string;
  readonly algorithmMode: FlowAlg;
  readonly nodes: readonly NodeStructure[];
  readonly connections: readonly ConnectionTuple[];
}

export interface FlowImportResult {
  readonly nodes: Node[];
  readonly connections: ConnValidType[];
  /**
   * Maps the exported node ids to the recreated nodes
   */
  readonly remap: IdRemap<Node>;
}

export function exportFlowStructure(flow: Flow): FlowStructure {
  const nodes = flow.nodes;
  const position = new Map(nodes.map((node, index) => [node, index]));

  const connections: ConnectionTuple[] = [];
  flow.connections().forEach(([out, inp]) => {
    const source = position.get(out.node);
    const target = position.get(inp.node);
    if (source !== undefined && target !== undefined) {
      connections.push([source, out.index, target, inp.index]);
    }
  });

  return {
    title: flow.title,
    algorithmMode: flow.algorithmMode,
    nodes: nodes.map(node => ({
      id: node.id,
      typeId: node.typeId,
      title: node.title,
      state: node.getState(),
      inputs: node.inputs.map(inp => inp.describe()),
      outputs: node.outputs.map(out => out.describe()),
    })),
    connections,
  };
}

/**
 * Recreates exported nodes and connections in a flow.
 * Nodes get fresh ids, their exported ids are kept as `prevId`.
 * Connections are made silently.
 * @throws FlowError if no registry is available or a connection references a missing node
 */
export function importFlowStructure(
  flow: Flow,
  data: FlowStructure,
  registry: NodeRegistry | undefined = flow.registry
): FlowImportResult {
  if (!registry) {
    throw new FlowError('A node registry is required to import nodes');
  }

  flow.setAlgorithmMode(data.algorithmMode);

  const remap = new IdRemap<Node>();
  const nodes = data.nodes.map(nodeData =>
    flow.createNode(registry.get(nodeData.typeId), undefined, node => {
      node.restorePorts(nodeData.inputs, nodeData.outputs);
      node.title = nodeData.title;
      node.prevId = nodeData.id;
      node.setState(nodeData.state);
      remap.register(nodeData.id, node);
    })
  );

  const connections = data.connections.map(([source, outIndex, target, inpIndex]) => {
    const outNode = nodes[source];
    const inpNode = nodes[target];
    if (!outNode || !inpNode) {
      throw new FlowError(`Connection references missing node ${!outNode ? source : target}`);
    }
    return flow.connectNodes(outNode, outIndex, inpNode, inpIndex, true);
  });

  flow.logger.logEvent('flow', 'imported', {
    flow: flow.title,
    nodes: nodes.length,
    connections: connections.length,
  });

  return { nodes, connections, remap };
}
