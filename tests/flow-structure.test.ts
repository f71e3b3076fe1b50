import { Flow } from '../lib/portflow/src/flow/flow';
import {
  exportFlowStructure,
  FlowStructure,
  importFlowStructure,
} from '../lib/portflow/src/flow/flow-structure';
import { NodeRegistry } from '../lib/portflow/src/session/registry';
import { ConnValidType } from '../lib/portflow/src/types/connection';
import { FlowAlg } from '../lib/portflow/src/types/flow-alg';
import { PortDirection, PortKind } from '../lib/portflow/src/types/port';
import { FlowError } from '../lib/portflow/src/utils/errors';
import { ConstNode, SumNode } from './utils/test-nodes';

describe("Flow structure export and import", () => {
  function createRegistry(): NodeRegistry {
    const registry = new NodeRegistry();
    registry.registerAll([ConstNode, SumNode]);
    return registry;
  }

  function createSource() {
    const registry = createRegistry();
    const flow = new Flow('main', { registry, algorithmMode: FlowAlg.DATA_OPT });
    const a = flow.createNode(ConstNode, { value: 5 });
    const b = flow.createNode(ConstNode, { value: 7 });
    const sum = flow.createNode(SumNode);
    flow.connectNodes(a, 0, sum, 0, true);
    flow.connectNodes(b, 0, sum, 1, true);
    a.title = 'left';
    return { registry, flow, a, b, sum };
  }

  it("should export nodes, ports and connections", () => {
    const { flow, a, sum } = createSource();

    const data = exportFlowStructure(flow);

    expect(data.title).toBe('main');
    expect(data.algorithmMode).toBe(FlowAlg.DATA_OPT);
    expect(data.nodes).toHaveLength(3);
    expect(data.nodes[0]).toEqual({
      id: a.id,
      typeId: 'ConstNode',
      title: 'left',
      state: { value: 5 },
      inputs: [],
      outputs: [
        { label: 'value', direction: PortDirection.OUTPUT, kind: PortKind.DATA, allowedData: null },
      ],
    });
    expect(data.nodes[2].id).toBe(sum.id);
    expect(data.nodes[2].state).toBeNull();
    expect(data.nodes[2].inputs[1]).toEqual({
      label: 'b',
      direction: PortDirection.INPUT,
      kind: PortKind.DATA,
      allowedData: null,
      default: 0,
    });
    expect(data.connections).toEqual([
      [0, 0, 2, 0],
      [1, 0, 2, 1],
    ]);
  });

  it("should recreate nodes with fresh ids and remember the exported ones", () => {
    const { registry, flow, a } = createSource();
    const data = exportFlowStructure(flow);
    const copy = new Flow('copy', { registry });

    const result = importFlowStructure(copy, data);

    expect(copy.algorithmMode).toBe(FlowAlg.DATA_OPT);
    expect(result.nodes).toHaveLength(3);
    expect(result.connections).toEqual([ConnValidType.VALID, ConnValidType.VALID]);
    expect(result.remap.size).toBe(3);

    const left = result.remap.resolve(a.id);
    expect(left).toBe(result.nodes[0]);
    expect(result.nodes[0].prevId).toBe(a.id);
    expect(result.nodes[0].id).not.toBe(a.id);
    expect(result.nodes[0].title).toBe('left');
  });

  it("should restore node state so the copy computes the same result", () => {
    const { registry, flow } = createSource();
    const copy = new Flow('copy', { registry });

    const { nodes } = importFlowStructure(copy, exportFlowStructure(flow));
    nodes[0].update();

    expect(nodes[2].outputs[0].value).toBe(12);
    expect(exportFlowStructure(copy).connections).toEqual(exportFlowStructure(flow).connections);
  });

  it("should serialize to JSON", () => {
    const { flow } = createSource();
    const data = exportFlowStructure(flow);

    const text = JSON.stringify(data);

    expect(text).toContain('"typeId":"SumNode"');
    expect(text).toContain('"connections":[[0,0,2,0],[1,0,2,1]]');
  });

  it("should require a registry", () => {
    const { flow } = createSource();

    expect(() => importFlowStructure(new Flow('copy'), exportFlowStructure(flow))).toThrow(
      'A node registry is required to import nodes'
    );
  });

  it("should reject connections to missing nodes", () => {
    const registry = createRegistry();
    const data: FlowStructure = {
      title: 'broken',
      algorithmMode: FlowAlg.DATA,
      nodes: [],
      connections: [[0, 0, 5, 0]],
    };

    expect(() => importFlowStructure(new Flow('copy', { registry }), data)).toThrow(FlowError);
  });

  it("should reject unknown node types", () => {
    const registry = createRegistry();
    const data: FlowStructure = {
      title: 'unknown',
      algorithmMode: FlowAlg.DATA,
      nodes: [{ id: 3, typeId: 'Missing', title: 'x', state: null, inputs: [], outputs: [] }],
      connections: [],
    };

    expect(() => importFlowStructure(new Flow('copy', { registry }), data)).toThrow(
      'Unknown node type: Missing'
    );
  });
});
