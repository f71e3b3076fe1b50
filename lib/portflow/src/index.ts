// ============================================
// Build API
// ============================================
export {
  createFlow,
  withFlowOptions,
  withTitle,
  withAlgorithmMode,
  withLoggerProvider,
  withTypeRegistry,
  withPlayer,
  withNodesConfig,
} from './operators';
export type {
  BuiltFlow,
  ConnectionDefinition,
  FlowDefinition,
  FlowOperator,
  NodeDefinition,
  NodesConfig,
} from './operators';
// ============================================
// Graph model
// ============================================
export { Flow, DEFAULT_MAX_PULL_DEPTH } from './flow/flow';
export type { Connection, ConnectionInfo } from './flow/flow';
export { Node, FrameNode } from './flow/node';
export type { NodeType } from './flow/node';
export { NodePort, NodeInput, NodeOutput, checkValidConn } from './flow/port';
export { exportFlowStructure, importFlowStructure } from './flow/flow-structure';
export type { FlowStructure, NodeStructure, FlowImportResult } from './flow/flow-structure';
// ============================================
// Executors
// ============================================
export {
  FlowExecutor,
  ManualFlow,
  DataFlowNaive,
  DataFlowOptimized,
  ExecFlowNaive,
  executorFromFlowAlg,
} from './executor';
// ============================================
// Players
// ============================================
export { GraphPlayer, FlowPlayer, GraphTime, GraphEvents, DEFAULT_FRAMES } from './player';
// ============================================
// Session
// ============================================
export { Session } from './session/session';
export type { SessionOptions, SessionStructure } from './session/session';
export { NodeRegistry } from './session/registry';
// ============================================
// Core services
// ============================================
export { PriorityEvent } from './core/event';
export type { EventCallback } from './core/event';
export { HookManager } from './core/hook-manager';
export { IdCounter, IdRemap, defaultIdCounter } from './core/id-counter';
export { DataTypeRegistry, createDefaultTypeRegistry } from './core/type-registry';
export type { TypePredicate } from './core/type-registry';
// ============================================
// Types
// ============================================
export { ConnValidType } from './types/connection';
export type { ConnectionTuple } from './types/connection';
export { FlowAlg, parseFlowAlg } from './types/flow-alg';
export { FlowEventType } from './types/flow-hooks';
export type { FlowEventHandlers } from './types/flow-hooks';
export type { IFlowOptions, IPlayerOptions } from './types/flow-options';
export { GraphState, GraphActionResponse } from './types/graph-state';
export type { GraphStateEvent, GraphActionResult } from './types/graph-state';
export { PortDirection, PortKind, PRODUCE_OUTPUT } from './types/port';
export type { AllowedData, PortConfig, PortDescriptor } from './types/port';
export { SessionEventType } from './types/session-hooks';
export type { SessionEventHandlers } from './types/session-hooks';
export type { NodeConfig, Serializable, SerializableValue, UnsubscribeFn } from './types/utils';
export type { ILogger } from './types/logger';
export { LogLevel } from './types/logger';
// ============================================
// Logging and errors
// ============================================
export {
  LoggerAdapter,
  ConsoleLoggerAdapter,
  LoggerFactory,
  LoggerType,
  LoggerManager,
} from './utils/logging';
export {
  NodeError,
  FlowError,
  TopologyLockedError,
  CycleDetectedError,
  PullDepthError,
  DataTypeError,
  isNodeError,
  isFlowError,
  getErrorMessage,
} from './utils/errors';
