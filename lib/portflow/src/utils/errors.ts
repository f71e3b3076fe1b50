/**
 * Error raised by a node callback, caught at the executor boundary
 *
 * Extends standard Error class, adding
 * information about the node that failed
 */
export class NodeError extends Error {
  /**
   * Identifier of node where error occurred
   */
  public readonly nodeId: number;

  /**
   * Title of node where error occurred
   */
  public readonly nodeTitle: string;

  /**
   * Original error, if exists
   */
  public readonly originalError?: Error;

  constructor(message: string, nodeId: number, nodeTitle: string, originalError?: Error) {
    super(message);

    this.name = 'NodeError';
    this.nodeId = nodeId;
    this.nodeTitle = nodeTitle;
    this.originalError = originalError;

    if (originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }

    Object.setPrototypeOf(this, NodeError.prototype);
  }

  public override toString(): string {
    return `[NodeError in ${this.nodeTitle || this.nodeId}] ${this.message}`;
  }

  /**
   * Converts error to object for serialization
   */
  toJSON(): {
    readonly name: string;
    readonly message: string;
    readonly nodeId: number;
    readonly nodeTitle: string;
    readonly originalError?: {
      readonly name: string;
      readonly message: string;
    };
  } {
    return {
      name: this.name,
      message: this.message,
      nodeId: this.nodeId,
      nodeTitle: this.nodeTitle,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
          }
        : undefined,
    };
  }
}

/**
 * Base class for programming errors made by callers of the flow API,
 * such as referencing ports the flow doesn't own
 */
export class FlowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FlowError';
    Object.setPrototypeOf(this, FlowError.prototype);
  }
}

/**
 * Topology change requested while an execution or a player pass is in flight
 */
export class TopologyLockedError extends FlowError {
  public readonly operation: string;

  constructor(operation: string) {
    super(`Cannot ${operation} while an execution is in flight`);
    this.name = 'TopologyLockedError';
    this.operation = operation;
    Object.setPrototypeOf(this, TopologyLockedError.prototype);
  }
}

/**
 * A cycle is reachable from the trigger of an optimized data flow execution
 */
export class CycleDetectedError extends FlowError {
  public readonly nodeIds: readonly number[];

  constructor(nodeIds: readonly number[]) {
    super(`Cycle detected between nodes ${nodeIds.join(', ')}`);
    this.name = 'CycleDetectedError';
    this.nodeIds = nodeIds;
    Object.setPrototypeOf(this, CycleDetectedError.prototype);
  }
}

/**
 * Pull-based input resolution re-entered a node already being pulled,
 * or nested deeper than allowed
 */
export class PullDepthError extends FlowError {
  public readonly nodeId: number;

  constructor(message: string, nodeId: number) {
    super(message);
    this.name = 'PullDepthError';
    this.nodeId = nodeId;
    Object.setPrototypeOf(this, PullDepthError.prototype);
  }
}

/**
 * A value set on an output is rejected by the output's declared type
 */
export class DataTypeError extends FlowError {
  constructor(message: string) {
    super(message);
    this.name = 'DataTypeError';
    Object.setPrototypeOf(this, DataTypeError.prototype);
  }
}

export function isNodeError(error: unknown): error is NodeError {
  return error instanceof NodeError;
}

export function isFlowError(error: unknown): error is FlowError {
  return error instanceof FlowError;
}

/**
 * Creates new NodeError wrapping whatever a node callback threw
 */
export function createNodeError(nodeId: number, nodeTitle: string, error: unknown): NodeError {
  return new NodeError(
    `Node update error: ${getErrorMessage(error)}`,
    nodeId,
    nodeTitle,
    error instanceof Error ? error : undefined
  );
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
