import type { NodeType } from '../flow/node';

/**
 * Registry of node types, keyed by type id.
 * Type ids name node classes in exported flows.
 */
export class NodeRegistry {
  private readonly typesById = new Map<string, NodeType>();
  private readonly idsByType = new Map<unknown, string>();

  /**
   * Registers a node type
   * @param type Node class
   * @param typeId Type id, defaults to the class name
   * @throws Error if the id or the class is already registered
   */
  register(type: NodeType, typeId: string = type.name): void {
    if (this.typesById.has(typeId)) {
      throw new Error(`Node type '${typeId}' is already registered`);
    }
    if (this.idsByType.has(type)) {
      throw new Error(`Node class '${type.name}' is already registered as '${String(this.idsByType.get(type))}'`);
    }
    this.typesById.set(typeId, type);
    this.idsByType.set(type, typeId);
  }

  registerAll(types: Iterable<NodeType>): void {
    for (const type of types) {
      this.register(type);
    }
  }

  /**
   * Gets node type by id
   * @throws Error if type not found
   */
  get(typeId: string): NodeType {
    const type = this.typesById.get(typeId);
    if (!type) {
      throw new Error(`Unknown node type: ${typeId}`);
    }
    return type;
  }

  has(typeId: string): boolean {
    return this.typesById.has(typeId);
  }

  /**
   * Type id of a node class, undefined if not registered
   */
  typeIdOf(type: unknown): string | undefined {
    return this.idsByType.get(type);
  }

  unregister(typeId: string): boolean {
    const type = this.typesById.get(typeId);
    if (!type) {
      return false;
    }
    this.typesById.delete(typeId);
    this.idsByType.delete(type);
    return true;
  }

  /**
   * Registered type ids
   */
  types(): string[] {
    return [...this.typesById.keys()];
  }

  public get size(): number {
    return this.typesById.size;
  }

  clear(): void {
    this.typesById.clear();
    this.idsByType.clear();
  }
}
