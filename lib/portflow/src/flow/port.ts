import type { DataTypeRegistry } from '../core/type-registry';
import { ConnValidType } from '../types/connection';
import { AllowedData, PortConfig, PortDescriptor, PortDirection, PortKind } from '../types/port';
import type { Node } from './node';

/**
 * Connection terminal owned by a node
 */
export abstract class NodePort {
  abstract readonly direction: PortDirection;

  public label: string;
  public readonly kind: PortKind;
  public readonly allowedData: AllowedData;

  constructor(
    public readonly node: Node,
    config: PortConfig = {}
  ) {
    this.label = config.label ?? '';
    this.kind = config.kind ?? PortKind.DATA;
    this.allowedData = config.allowedData ?? null;
  }

  /**
   * Position of the port in its node's input or output list, -1 once deleted
   */
  abstract get index(): number;

  isData(): boolean {
    return this.kind === PortKind.DATA;
  }

  describe(): PortDescriptor {
    return {
      label: this.label,
      direction: this.direction,
      kind: this.kind,
      allowedData: this.allowedData,
    };
  }

  toString(): string {
    return `${this.node.title}.${this.direction}[${this.index}]`;
  }
}

export class NodeInput extends NodePort {
  readonly direction = PortDirection.INPUT;

  /**
   * Value read while the input is not connected
   */
  public default: unknown;

  constructor(node: Node, config: PortConfig = {}) {
    super(node, config);
    this.default = config.default;
  }

  get index(): number {
    return this.node.inputs.indexOf(this);
  }

  override describe(): PortDescriptor {
    if (this.default === undefined) {
      return super.describe();
    }
    return { ...super.describe(), default: this.default };
  }
}

export class NodeOutput extends NodePort {
  readonly direction = PortDirection.OUTPUT;

  /**
   * Last value set on this output
   */
  public value: unknown = undefined;

  get index(): number {
    return this.node.outputs.indexOf(this);
  }
}

/**
 * Port configuration recreating an exported port
 */
export function portConfigFromDescriptor(descriptor: PortDescriptor): PortConfig {
  return {
    label: descriptor.label,
    kind: descriptor.kind,
    allowedData: descriptor.allowedData,
    default: descriptor.default,
  };
}

/**
 * Checks the port-level rules of a connection from `out` to `inp`.
 * Doesn't look at existing connections, see {@link Flow.canPortsConnect}.
 */
export function checkValidConn(
  out: NodePort,
  inp: NodePort,
  types: DataTypeRegistry
): ConnValidType {
  if (out.node === inp.node) {
    return ConnValidType.SAME_NODE;
  }
  if (out.direction === inp.direction) {
    return ConnValidType.SAME_IO;
  }
  if (out.direction !== PortDirection.OUTPUT) {
    return ConnValidType.IO_MISMATCH;
  }
  if (out.kind !== inp.kind) {
    return ConnValidType.DIFF_ALG_TYPE;
  }
  if (out.isData() && !types.accepts(inp.allowedData, out.allowedData)) {
    return ConnValidType.DATA_MISMATCH;
  }
  return ConnValidType.VALID;
}
