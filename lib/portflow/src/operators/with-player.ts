import type { IPlayerOptions } from '../types/flow-options';
import type { FlowOperator } from './operator-types';

/**
 * Attaches a FlowPlayer to the created flow
 */
export function withPlayer(options: IPlayerOptions = {}): FlowOperator {
  return definition => ({ ...definition, player: { ...definition.player, ...options } });
}
