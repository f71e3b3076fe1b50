/**
 * Enumeration of possible graph player states
 */
export enum GraphState {
  /**
   * Initial and terminal state. The flow runs on its own executor.
   */
  STOPPED = 'stopped',

  /**
   * The player owns the flow and evaluates it, once or once per frame.
   */
  PLAYING = 'playing',

  /**
   * Frame ticks are suspended, graph state preserved.
   * Only reachable when the flow has frame-driven nodes.
   */
  PAUSED = 'paused',
}

/**
 * Response to a play, pause, resume or stop request
 */
export enum GraphActionResponse {
  /** No graph found for the request */
  NO_GRAPH = 'no-graph',
  /** The transition is not legal in the current state */
  NOT_ALLOWED = 'not-allowed',
  /** The action was successful */
  SUCCESS = 'success',
}

/**
 * Emitted on every state transition of a player
 */
export interface GraphStateEvent {
  readonly oldState: GraphState;
  readonly newState: GraphState;
}

/**
 * Response paired with a human readable explanation
 */
export interface GraphActionResult {
  readonly response: GraphActionResponse;
  readonly message: string;
}
