import { Flow } from '../lib/portflow/src/flow/flow';
import { ExecFlowNaive } from '../lib/portflow/src/executor';
import { ConnValidType } from '../lib/portflow/src/types/connection';
import { FlowAlg } from '../lib/portflow/src/types/flow-alg';
import { FlowEventType } from '../lib/portflow/src/types/flow-hooks';
import { FlowError, NodeError, PullDepthError } from '../lib/portflow/src/utils/errors';
import { Node } from '../lib/portflow/src/flow/node';
import { ConstNode, IncrementNode, PrinterNode, TriggerNode } from './utils/test-nodes';

describe("Exec flow", () => {
  function collectErrors(flow: Flow): Array<{ node: Node; error: NodeError }> {
    const errors: Array<{ node: Node; error: NodeError }> = [];
    flow.on(FlowEventType.NODE_UPDATE_ERROR, (node, error) => errors.push({ node, error }));
    return errors;
  }

  it("should select the exec executor", () => {
    const flow = new Flow('main', { algorithmMode: FlowAlg.EXEC });

    expect(flow.executor).toBeInstanceOf(ExecFlowNaive);
  });

  it("should pull data from predecessors when a trigger arrives", () => {
    const flow = new Flow('main', { algorithmMode: FlowAlg.EXEC });
    const trigger = flow.createNode(TriggerNode);
    const printer = flow.createNode(PrinterNode);
    const data = flow.createNode(ConstNode, { value: 'hello' });
    flow.connectNodes(trigger, 0, printer, 0);
    flow.connectNodes(data, 0, printer, 1);

    expect(printer.received).toEqual([]);

    trigger.update();

    expect(printer.received).toEqual(['hello']);
    expect(data.calls).toEqual([-1]);
  });

  it("should read the default of an unconnected data input", () => {
    const flow = new Flow('main', { algorithmMode: FlowAlg.EXEC });
    const trigger = flow.createNode(TriggerNode);
    const printer = flow.createNode(PrinterNode);
    flow.connectNodes(trigger, 0, printer, 0);

    trigger.update();

    expect(printer.received).toEqual(['default value']);
  });

  it("should chain exec outputs", () => {
    const flow = new Flow('main', { algorithmMode: FlowAlg.EXEC });
    const trigger = flow.createNode(TriggerNode);
    const first = flow.createNode(PrinterNode);
    const second = flow.createNode(PrinterNode);
    flow.connectNodes(trigger, 0, first, 0);
    flow.connectNodes(first, 0, second, 0);

    trigger.update();

    expect(first.received).toEqual(['default value']);
    expect(second.received).toEqual(['default value']);
  });

  it("should not propagate data outputs", () => {
    const flow = new Flow('main', { algorithmMode: FlowAlg.EXEC });
    const source = flow.createNode(ConstNode, { value: 1 });
    const inc = flow.createNode(IncrementNode);
    flow.connectNodes(source, 0, inc, 0);

    source.update();

    expect(inc.calls).toEqual([]);
  });

  it("should refuse connections between exec and data ports", () => {
    const flow = new Flow('main', { algorithmMode: FlowAlg.EXEC });
    const trigger = flow.createNode(TriggerNode);
    const printer = flow.createNode(PrinterNode);

    expect(flow.connectNodes(trigger, 0, printer, 1)).toBe(ConnValidType.DIFF_ALG_TYPE);
  });

  it("should report a pull cycle once, on the re-entered reader", () => {
    const flow = new Flow('main', { algorithmMode: FlowAlg.EXEC, silentErrors: true });
    const x = flow.createNode(IncrementNode);
    const y = flow.createNode(IncrementNode);
    flow.connectNodes(x, 0, y, 0);
    flow.connectNodes(y, 0, x, 0);
    const errors = collectErrors(flow);

    x.update();

    expect(errors).toHaveLength(1);
    expect(errors[0].node).toBe(x);
    expect(errors[0].error.originalError).toBeInstanceOf(PullDepthError);
    expect(y.outputs[0].value).toBe(1);
    expect(x.outputs[0].value).toBe(2);
    expect(x.calls).toEqual([-1, -1]);
    expect(y.calls).toEqual([-1]);
  });

  it("should stop pulls nested deeper than the flow allows", () => {
    const flow = new Flow('main', { algorithmMode: FlowAlg.EXEC, silentErrors: true, maxPullDepth: 2 });
    const chain = [0, 1, 2, 3].map(() => flow.createNode(IncrementNode));
    chain.slice(1).forEach((node, i) => flow.connectNodes(chain[i], 0, node, 0));
    const errors = collectErrors(flow);

    chain[3].update();

    expect(errors).toHaveLength(1);
    expect(errors[0].node).toBe(chain[1]);
    const original = errors[0].error.originalError;
    expect(original).toBeInstanceOf(PullDepthError);
    expect(original?.message).toBe(
      `Pull depth 2 exceeded at node 'increment' (${chain[0].id})`
    );
    expect(chain[3].outputs[0].value).toBe(2);
  });

  it("should reject reading exec inputs and setting exec outputs", () => {
    const flow = new Flow('main', { algorithmMode: FlowAlg.EXEC });
    const trigger = flow.createNode(TriggerNode);
    const printer = flow.createNode(PrinterNode);

    expect(() => printer.input(0)).toThrow(FlowError);
    expect(() => trigger.setOutput(0, 1)).toThrow("Output 0 of 'trigger' is not a data port");
    expect(() => printer.execOutput(5)).toThrow("Node 'printer' has no output 5");
  });
});
