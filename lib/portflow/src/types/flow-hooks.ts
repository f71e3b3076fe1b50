import type { Node } from '../flow/node';
import type { NodeInput, NodeOutput } from '../flow/port';
import type { NodeError } from '../utils/errors';
import type { ConnValidType } from './connection';
import type { FlowAlg } from './flow-alg';

/**
 * Types of all flow events
 */
export enum FlowEventType {
  // Node events
  NODE_CREATED = 'nodeCreated',
  NODE_ADDED = 'nodeAdded',
  NODE_REMOVED = 'nodeRemoved',
  NODE_UPDATING = 'nodeUpdating',
  NODE_UPDATED = 'nodeUpdated',
  NODE_UPDATE_ERROR = 'nodeUpdateError',
  OUTPUT_UPDATED = 'outputUpdated',

  // Topology events
  CONNECTION_ADDED = 'connectionAdded',
  CONNECTION_REMOVED = 'connectionRemoved',
  CONNECTION_REQUEST_VALID = 'connectionRequestValid',

  // Execution events
  CONNECTION_ACTIVATED = 'connectionActivated',
  EXECUTION_STARTED = 'executionStarted',
  EXECUTION_FINISHED = 'executionFinished',
  ALGORITHM_MODE_CHANGED = 'algorithmModeChanged',
}

/**
 * Handler type for each event
 */
export interface FlowEventHandlers {
  [FlowEventType.NODE_CREATED]: (node: Node) => void;
  [FlowEventType.NODE_ADDED]: (node: Node) => void;
  [FlowEventType.NODE_REMOVED]: (node: Node) => void;
  [FlowEventType.NODE_UPDATING]: (node: Node, inp: number) => void;
  [FlowEventType.NODE_UPDATED]: (node: Node, inp: number) => void;
  [FlowEventType.NODE_UPDATE_ERROR]: (node: Node, error: NodeError) => void;
  [FlowEventType.OUTPUT_UPDATED]: (node: Node, index: number, value: unknown) => void;
  [FlowEventType.CONNECTION_ADDED]: (out: NodeOutput, inp: NodeInput) => void;
  [FlowEventType.CONNECTION_REMOVED]: (out: NodeOutput, inp: NodeInput) => void;
  [FlowEventType.CONNECTION_REQUEST_VALID]: (result: ConnValidType) => void;
  [FlowEventType.CONNECTION_ACTIVATED]: (out: NodeOutput, inp: NodeInput) => void;
  [FlowEventType.EXECUTION_STARTED]: (root: Node) => void;
  [FlowEventType.EXECUTION_FINISHED]: (root: Node) => void;
  [FlowEventType.ALGORITHM_MODE_CHANGED]: (mode: FlowAlg) => void;
}
