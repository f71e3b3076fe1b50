import type { ILogger } from '../types/logger';
import type { FlowOperator } from './operator-types';

/**
 * Registers the logger used by the flow and its executors
 *
 * @example
 * ```typescript
 * const { flow } = createFlow(
 *   withLoggerProvider(LoggerFactory.getInstance().getLogger('editor', LoggerType.CONSOLE, LogLevel.INFO)),
 *   withNodesConfig({ nodeTypes, nodes })
 * );
 * ```
 */
export function withLoggerProvider(logger: ILogger): FlowOperator {
  return definition => ({
    ...definition,
    options: { ...definition.options, logger },
  });
}
