/**
 * Build API operators
 */
export { createFlow } from './create-flow';
export { withFlowOptions, withTitle } from './with-flow-options';
export { withAlgorithmMode } from './with-algorithm-mode';
export { withLoggerProvider } from './with-logger';
export { withTypeRegistry } from './with-type-registry';
export { withPlayer } from './with-player';
export { withNodesConfig } from './with-nodes-config';
export type { NodesConfig } from './with-nodes-config';
export type {
  BuiltFlow,
  ConnectionDefinition,
  FlowDefinition,
  FlowOperator,
  NodeDefinition,
} from './operator-types';
