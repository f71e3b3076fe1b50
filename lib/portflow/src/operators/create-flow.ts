import { Flow } from '../flow/flow';
import type { Node } from '../flow/node';
import { FlowPlayer } from '../player/flow-player';
import { NodeRegistry } from '../session/registry';
import { BuiltFlow, FlowDefinition, FlowOperator } from './operator-types';

/**
 * Creates a flow from operators, applied left to right
 *
 * @example
 * ```typescript
 * const { flow, node } = createFlow(
 *   withAlgorithmMode(FlowAlg.DATA_OPT),
 *   withNodesConfig({
 *     nodeTypes: [ConstNode, SumNode],
 *     nodes: [
 *       { key: 'a', type: 'ConstNode', config: { value: 5 } },
 *       { key: 'b', type: 'ConstNode', config: { value: 7 } },
 *       { key: 'sum', type: 'SumNode' },
 *     ],
 *     connections: [
 *       ['a', 0, 'sum', 0],
 *       ['b', 0, 'sum', 1],
 *     ],
 *   })
 * );
 * ```
 */
export function createFlow(...operators: readonly FlowOperator[]): BuiltFlow {
  let definition: FlowDefinition = {
    title: 'flow',
    options: {},
    nodeTypes: new Map(),
    nodes: [],
    connections: [],
  };

  for (const operator of operators) {
    definition = operator(definition);
  }

  return buildFlow(definition);
}

function buildFlow(definition: FlowDefinition): BuiltFlow {
  const registry = definition.options.registry ?? new NodeRegistry();
  definition.nodeTypes.forEach((type, typeId) => {
    if (registry.typeIdOf(type) === undefined) {
      registry.register(type, typeId);
    }
  });

  const flow = new Flow(definition.title, { ...definition.options, registry });
  if (definition.player) {
    flow.player = new FlowPlayer(definition.player);
  }

  const nodes = new Map<string, Node>();
  definition.nodes.forEach(nodeDef => {
    if (nodes.has(nodeDef.key)) {
      throw new Error(`Duplicate node key '${nodeDef.key}'`);
    }
    const type = definition.nodeTypes.get(nodeDef.type);
    if (!type) {
      throw new Error(`Unknown node type: ${nodeDef.type}`);
    }
    const node = flow.createNode(type, nodeDef.config, created => {
      if (nodeDef.title !== undefined) {
        created.title = nodeDef.title;
      }
    });
    nodes.set(nodeDef.key, node);
  });

  const node = (key: string): Node => {
    const found = nodes.get(key);
    if (!found) {
      throw new Error(`Unknown node key '${key}'`);
    }
    return found;
  };

  const connections = definition.connections.map(([source, outIndex, target, inpIndex]) =>
    flow.connectNodes(node(source), outIndex, node(target), inpIndex)
  );

  return { flow, nodes, connections, node };
}
