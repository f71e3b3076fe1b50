import { Flow } from '../lib/portflow/src/flow/flow';
import { Node } from '../lib/portflow/src/flow/node';
import { DataFlowOptimized } from '../lib/portflow/src/executor';
import { ConnValidType } from '../lib/portflow/src/types/connection';
import { FlowAlg } from '../lib/portflow/src/types/flow-alg';
import { FlowEventType } from '../lib/portflow/src/types/flow-hooks';
import { LogLevel } from '../lib/portflow/src/types/logger';
import { PortDirection, PortKind } from '../lib/portflow/src/types/port';
import { DataTypeError, FlowError, NodeError, TopologyLockedError } from '../lib/portflow/src/utils/errors';
import { TestLoggerAdapter } from './utils/test-logger-adapter';
import { ConstNode, FailingNode, PassNode, SumNode, TriggerNode } from './utils/test-nodes';

class BrokenPlacement extends Node {
  placeEvent(): void {
    throw new Error('cannot place');
  }

  updateEvent(): void {}
}

describe("Flow - nodes", () => {
  it("should create, place and announce nodes", () => {
    const flow = new Flow('main');
    const events: string[] = [];
    flow.on(FlowEventType.NODE_CREATED, node => events.push(`created:${node.title}`));
    flow.on(FlowEventType.NODE_ADDED, node => events.push(`added:${node.title}`));

    const node = flow.createNode(ConstNode, { value: 1 });

    expect(events).toEqual(['created:const', 'added:const']);
    expect(flow.nodes).toEqual([node]);
    expect(flow.hasNode(node)).toBe(true);
    expect(node.outputs[0].value).toBe(1);
  });

  it("should hand out ascending ids", () => {
    const flow = new Flow('main');
    const a = flow.createNode(PassNode);
    const b = flow.createNode(PassNode);

    expect(b.id).toBeGreaterThan(a.id);
  });

  it("should disconnect removed nodes silently and return their connections", () => {
    const flow = new Flow('main');
    const source = flow.createNode(ConstNode, { value: 5 });
    const pass = flow.createNode(PassNode);
    flow.connectNodes(source, 0, pass, 0);
    const removedEvents: Node[] = [];
    flow.on(FlowEventType.NODE_REMOVED, node => removedEvents.push(node));

    const removed = flow.removeNode(source);

    expect(removed).toEqual([[source.outputs[0], pass.inputs[0]]]);
    expect(pass.calls).toEqual([0]);
    expect(pass.anyInputConnected()).toBe(false);
    expect(flow.hasNode(source)).toBe(false);
    expect(removedEvents).toEqual([source]);
  });

  it("should place a removed node again", () => {
    const flow = new Flow('main');
    const source = flow.createNode(ConstNode, { value: 5 });
    const pass = flow.createNode(PassNode);
    flow.removeNode(source);

    flow.addNode(source);
    flow.connectNodes(source, 0, pass, 0);

    expect(flow.nodes).toEqual([pass, source]);
    expect(pass.outputs[0].value).toBe(5);
  });

  it("should refuse foreign and already placed nodes", () => {
    const flow = new Flow('main');
    const other = new Flow('other');
    const node = flow.createNode(PassNode);
    const foreign = other.createNode(PassNode);

    expect(() => flow.addNode(node)).toThrow("Node 'pass' is already placed");
    expect(() => flow.addNode(foreign)).toThrow("Node 'pass' belongs to another flow");
    expect(() => flow.connectNodes(node, 0, foreign, 0)).toThrow(FlowError);
  });

  it("should report errors thrown while placing a node", () => {
    const flow = new Flow('main', { silentErrors: true });
    const errors: NodeError[] = [];
    flow.on(FlowEventType.NODE_UPDATE_ERROR, (_node, error) => errors.push(error));

    const node = flow.createNode(BrokenPlacement);

    expect(flow.hasNode(node)).toBe(true);
    expect(errors.map(error => error.message)).toEqual(['Node update error: cannot place']);
  });

  it("should list distinct successors and predecessors", () => {
    const flow = new Flow('main');
    const source = flow.createNode(ConstNode, { value: 1 });
    const sum = flow.createNode(SumNode);
    const pass = flow.createNode(PassNode);
    flow.connectNodes(source, 0, sum, 0, true);
    flow.connectNodes(source, 0, sum, 1, true);
    flow.connectNodes(source, 0, pass, 0, true);

    expect(flow.successors(source)).toEqual([sum, pass]);
    expect(flow.predecessors(sum)).toEqual([source]);
    expect(flow.connectedInputs(source.outputs[0])).toEqual([sum.inputs[0], sum.inputs[1], pass.inputs[0]]);
    expect(flow.connections()).toHaveLength(3);
    expect(flow.connectionInfo(source.outputs[0], sum.inputs[1])).toEqual({
      outNode: source,
      outIndex: 0,
      inpNode: sum,
      inpIndex: 1,
    });
  });
});

describe("Flow - connections", () => {
  function setup() {
    const flow = new Flow('main');
    const a = flow.createNode(ConstNode, { value: 1 });
    const b = flow.createNode(ConstNode, { value: 2 });
    const p = flow.createNode(PassNode);
    const q = flow.createNode(PassNode);
    return { flow, a, b, p, q };
  }

  it("should answer invalid requests with a code", () => {
    const { flow, p, q } = setup();
    const trigger = flow.createNode(TriggerNode);

    expect(flow.connectPorts(p.outputs[0], p.inputs[0])).toBe(ConnValidType.SAME_NODE);
    expect(flow.connectPorts(p.outputs[0], q.outputs[0])).toBe(ConnValidType.SAME_IO);
    expect(flow.connectPorts(p.inputs[0], q.outputs[0])).toBe(ConnValidType.IO_MISMATCH);
    expect(flow.connectPorts(trigger.outputs[0], p.inputs[0])).toBe(ConnValidType.DIFF_ALG_TYPE);
    expect(flow.connections()).toEqual([]);
  });

  it("should treat repeated requests as idempotent", () => {
    const { flow, a, b, p } = setup();

    expect(flow.connectNodes(a, 0, p, 0)).toBe(ConnValidType.VALID);
    expect(flow.connectNodes(a, 0, p, 0)).toBe(ConnValidType.ALREADY_CONNECTED);
    expect(flow.connectNodes(b, 0, p, 0)).toBe(ConnValidType.INPUT_TAKEN);
    expect(flow.connections()).toHaveLength(1);

    expect(flow.disconnectNodes(a, 0, p, 0)).toBe(ConnValidType.VALID);
    expect(flow.disconnectNodes(a, 0, p, 0)).toBe(ConnValidType.ALREADY_DISCONNECTED);
    expect(flow.connections()).toEqual([]);
  });

  it("should check connections without applying them", () => {
    const { flow, a, p } = setup();
    const results: ConnValidType[] = [];
    flow.on(FlowEventType.CONNECTION_REQUEST_VALID, result => results.push(result));

    expect(flow.checkConnectionValidity(a.outputs[0], p.inputs[0])).toBe(ConnValidType.VALID);
    expect(flow.canPortsConnect(a.outputs[0], p.inputs[0])).toBe(ConnValidType.VALID);
    expect(flow.canPortsDisconnect(a.outputs[0], p.inputs[0])).toBe(ConnValidType.ALREADY_DISCONNECTED);
    expect(p.inputConnected(0)).toBe(false);
    expect(results).toEqual([
      ConnValidType.VALID,
      ConnValidType.VALID,
      ConnValidType.ALREADY_DISCONNECTED,
    ]);
  });

  it("should emit connection events", () => {
    const { flow, a, p } = setup();
    const events: string[] = [];
    flow.on(FlowEventType.CONNECTION_ADDED, (out, inp) => events.push(`+${out.toString()}->${inp.toString()}`));
    flow.on(FlowEventType.CONNECTION_REMOVED, (out, inp) => events.push(`-${out.toString()}->${inp.toString()}`));

    flow.connectNodes(a, 0, p, 0);
    flow.disconnectNodes(a, 0, p, 0);

    expect(events).toEqual(['+const.output[0]->pass.input[0]', '-const.output[0]->pass.input[0]']);
  });

  it("should log invalid requests at debug level", () => {
    const logger = new TestLoggerAdapter(LogLevel.DEBUG);
    const flow = new Flow('main', { logger });
    const p = flow.createNode(PassNode);
    logger.clear();

    flow.connectPorts(p.outputs[0], p.inputs[0]);

    expect(logger.messages(LogLevel.DEBUG)).toEqual([
      'Invalid connect request pass.output[0] -> pass.input[0]: same-node',
    ]);
  });
});

describe("Flow - ports", () => {
  it("should create, rename and delete ports", () => {
    const flow = new Flow('main');
    const source = flow.createNode(ConstNode, { value: 3 });
    const pass = flow.createNode(PassNode);

    const extra = pass.createInput({ label: 'extra', default: 9 });
    pass.createInput({ label: 'inserted' }, 1);
    pass.createOutput({ label: 'done', kind: PortKind.EXEC });
    pass.renameInput(0, 'main');

    expect(pass.inputs.map(inp => inp.label)).toEqual(['main', 'inserted', 'extra']);
    expect(pass.outputs.map(out => out.label)).toEqual(['out', 'done']);
    expect(extra.index).toBe(2);
    expect(pass.input(2)).toBe(9);

    flow.connectNodes(source, 0, pass, 2);
    expect(pass.inputConnected(2)).toBe(true);
    expect(pass.calls).toEqual([2]);

    pass.deleteInput(2);
    expect(pass.inputs).toHaveLength(2);
    expect(source.outputConnected(0)).toBe(false);
    expect(extra.index).toBe(-1);
  });

  it("should describe ports", () => {
    const flow = new Flow('main');
    const sum = flow.createNode(SumNode);

    expect(sum.inputs[0].describe()).toEqual({
      label: 'a',
      direction: PortDirection.INPUT,
      kind: PortKind.DATA,
      allowedData: null,
      default: 0,
    });
    expect(sum.outputs[0].describe()).toEqual({
      label: 'sum',
      direction: PortDirection.OUTPUT,
      kind: PortKind.DATA,
      allowedData: 'number',
    });
  });

  it("should check values against the output type", () => {
    const flow = new Flow('main');
    const sum = flow.createNode(SumNode);

    expect(() => sum.setOutput(0, 'text')).toThrow(DataTypeError);
    expect(() => sum.setOutput(0, 'text')).toThrow(
      "Value of type string rejected by output 0 of 'sum' (number)"
    );
    expect(() => sum.input(5)).toThrow("Node 'sum' has no input 5");
  });

  it("should refuse deleting connected ports through restore", () => {
    const flow = new Flow('main');
    const source = flow.createNode(ConstNode, { value: 3 });
    const pass = flow.createNode(PassNode);
    flow.connectNodes(source, 0, pass, 0, true);

    expect(() => pass.restorePorts([], [])).toThrow("Cannot restore ports of connected node 'pass'");
  });
});

describe("Flow - errors and modes", () => {
  it("should report node errors and keep propagating to other branches", () => {
    const logger = new TestLoggerAdapter(LogLevel.ERROR);
    const flow = new Flow('main', { logger });
    const source = flow.createNode(ConstNode, { value: 1 });
    const failing = flow.createNode(FailingNode);
    const pass = flow.createNode(PassNode);
    flow.connectNodes(source, 0, failing, 0, true);
    flow.connectNodes(source, 0, pass, 0, true);
    const errors: NodeError[] = [];
    flow.on(FlowEventType.NODE_UPDATE_ERROR, (_node, error) => errors.push(error));

    source.update();

    expect(errors).toHaveLength(1);
    expect(errors[0].nodeId).toBe(failing.id);
    expect(errors[0].nodeTitle).toBe('failing');
    expect(pass.outputs[0].value).toBe(1);
    expect(logger.messages(LogLevel.ERROR)).toEqual([
      `Error in node 'failing' (${failing.id}): Node update error: Test computation error`,
    ]);
  });

  it("should not log node errors when silent", () => {
    const logger = new TestLoggerAdapter(LogLevel.DEBUG);
    const flow = new Flow('main', { logger, silentErrors: true });
    const failing = flow.createNode(FailingNode);
    let reported = 0;
    flow.on(FlowEventType.NODE_UPDATE_ERROR, () => {
      reported += 1;
    });

    failing.update();

    expect(reported).toBe(1);
    expect(logger.messages(LogLevel.ERROR)).toEqual([]);
  });

  it("should switch algorithm modes", () => {
    const logger = new TestLoggerAdapter(LogLevel.INFO);
    const flow = new Flow('main', { logger });
    const modes: FlowAlg[] = [];
    flow.on(FlowEventType.ALGORITHM_MODE_CHANGED, mode => modes.push(mode));

    expect(flow.setAlgorithmMode('data opt')).toBe(true);
    expect(flow.setAlgorithmMode(FlowAlg.DATA_OPT)).toBe(true);
    expect(flow.setAlgorithmMode('turbo')).toBe(false);

    expect(flow.algorithmMode).toBe(FlowAlg.DATA_OPT);
    expect(flow.executor).toBeInstanceOf(DataFlowOptimized);
    expect(modes).toEqual([FlowAlg.DATA_OPT]);
    expect(logger.messages(LogLevel.INFO)).toEqual([
      '[EVENT][flow][algorithmModeChanged] {"flow":"main","mode":"data-opt"}',
    ]);
    expect(logger.messages(LogLevel.WARN)).toEqual(["Unknown algorithm mode 'turbo'"]);
  });

  it("should log placed nodes as events", () => {
    const logger = new TestLoggerAdapter(LogLevel.INFO);
    const flow = new Flow('main', { logger });

    const node = flow.createNode(PassNode);

    expect(logger.messages()).toEqual([
      `[EVENT][flow][nodeAdded] {"flow":"main","node":${node.id},"title":"pass"}`,
    ]);
  });

  it("should refuse topology changes while locked", () => {
    const flow = new Flow('main');
    const a = flow.createNode(ConstNode, { value: 1 });
    const p = flow.createNode(PassNode);

    flow.lockTopology();
    expect(flow.topologyLocked).toBe(true);
    expect(() => flow.connectNodes(a, 0, p, 0)).toThrow(TopologyLockedError);
    expect(() => flow.createNode(PassNode)).toThrow('Cannot add node while an execution is in flight');
    expect(() => flow.removeNode(a)).toThrow(TopologyLockedError);
    expect(() => p.createInput()).toThrow(TopologyLockedError);
    expect(() => flow.setAlgorithmMode(FlowAlg.EXEC)).toThrow(TopologyLockedError);

    flow.unlockTopology();
    expect(flow.connectNodes(a, 0, p, 0)).toBe(ConnValidType.VALID);
  });
});
