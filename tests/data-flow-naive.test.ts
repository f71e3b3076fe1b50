import { Flow } from '../lib/portflow/src/flow/flow';
import { DataFlowNaive } from '../lib/portflow/src/executor';
import { FlowEventType } from '../lib/portflow/src/types/flow-hooks';
import { ConstNode, IncrementNode, PassNode, SumNode } from './utils/test-nodes';

describe("Naive data flow", () => {
  it("should use naive data flow by default", () => {
    const flow = new Flow('main');

    expect(flow.executor).toBeInstanceOf(DataFlowNaive);
  });

  it("should recompute a sum as its inputs are connected and updated", () => {
    const flow = new Flow('main');
    const a = flow.createNode(ConstNode, { value: 5 });
    const b = flow.createNode(ConstNode, { value: 7 });
    const sum = flow.createNode(SumNode);

    flow.connectNodes(a, 0, sum, 0);
    expect(sum.outputs[0].value).toBe(5);

    flow.connectNodes(b, 0, sum, 1);
    expect(sum.outputs[0].value).toBe(12);

    a.value = 10;
    a.update();
    expect(sum.outputs[0].value).toBe(17);
    expect(sum.calls).toEqual([0, 1, 0]);
  });

  it("should update the target when a connection is removed", () => {
    const flow = new Flow('main');
    const a = flow.createNode(ConstNode, { value: 5 });
    const b = flow.createNode(ConstNode, { value: 7 });
    const sum = flow.createNode(SumNode);
    flow.connectNodes(a, 0, sum, 0);
    flow.connectNodes(b, 0, sum, 1);

    flow.disconnectNodes(a, 0, sum, 0);

    expect(sum.outputs[0].value).toBe(7);
  });

  it("should not update the target of silent connections", () => {
    const flow = new Flow('main');
    const a = flow.createNode(ConstNode, { value: 5 });
    const sum = flow.createNode(SumNode);

    flow.connectNodes(a, 0, sum, 0, true);

    expect(sum.calls).toEqual([]);
    expect(sum.outputs[0].value).toBeUndefined();
  });

  it("should update a diamond's join once per branch", () => {
    const flow = new Flow('main');
    const root = flow.createNode(ConstNode, { value: 1 });
    const left = flow.createNode(IncrementNode);
    const right = flow.createNode(IncrementNode);
    const join = flow.createNode(SumNode);
    flow.connectNodes(root, 0, left, 0, true);
    flow.connectNodes(root, 0, right, 0, true);
    flow.connectNodes(left, 0, join, 0, true);
    flow.connectNodes(right, 0, join, 1, true);

    root.update();

    expect(join.calls).toEqual([0, 1]);
    expect(join.outputs[0].value).toBe(4);
  });

  it("should propagate along a chain and emit output and activation events", () => {
    const flow = new Flow('main');
    const a = flow.createNode(ConstNode, { value: 'x' });
    const p = flow.createNode(PassNode);
    const q = flow.createNode(PassNode);
    flow.connectNodes(a, 0, p, 0, true);
    flow.connectNodes(p, 0, q, 0, true);

    const outputs: Array<[string, unknown]> = [];
    const activated: string[] = [];
    flow.on(FlowEventType.OUTPUT_UPDATED, (node, _index, value) => outputs.push([node.title, value]));
    flow.on(FlowEventType.CONNECTION_ACTIVATED, (out, inp) =>
      activated.push(`${out.node.title}->${inp.node.title}`)
    );

    a.update();

    expect(q.outputs[0].value).toBe('x');
    expect(outputs).toEqual([
      ['const', 'x'],
      ['pass', 'x'],
      ['pass', 'x'],
    ]);
    expect(activated).toEqual(['const->pass', 'pass->pass']);
  });

  it("should ignore updates of blocked nodes", () => {
    const flow = new Flow('main');
    const a = flow.createNode(ConstNode, { value: 3 });
    const p = flow.createNode(PassNode);
    flow.connectNodes(a, 0, p, 0, true);

    p.blockUpdates = true;
    a.update();

    expect(p.calls).toEqual([]);
  });
});
