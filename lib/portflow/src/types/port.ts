/**
 * Direction of a port relative to its node
 */
export enum PortDirection {
  INPUT = 'input',
  OUTPUT = 'output',
}

/**
 * Kind of signal a port carries.
 * Data ports carry values, exec ports carry trigger signals only.
 */
export enum PortKind {
  DATA = 'data',
  EXEC = 'exec',
}

/**
 * A data type tag, a union of tags, or null for "accepts anything".
 * Tags are resolved through a {@link DataTypeRegistry}.
 */
export type AllowedData = string | readonly string[] | null;

/**
 * Configuration for creating ports, used for a node's static
 * `initInputs`/`initOutputs` and for ports created at runtime.
 */
export interface PortConfig {
  label?: string;
  kind?: PortKind;
  allowedData?: AllowedData;
  /**
   * Value read from an unconnected input. Ignored for outputs.
   */
  default?: unknown;
}

/**
 * Serializable description of a port, as written by the structural export
 */
export interface PortDescriptor {
  readonly label: string;
  readonly direction: PortDirection;
  readonly kind: PortKind;
  readonly allowedData: AllowedData;
  readonly default?: unknown;
}

/**
 * Trigger index passed to `updateEvent` when the node is asked to produce
 * its outputs rather than react to a specific input.
 */
export const PRODUCE_OUTPUT = -1;
