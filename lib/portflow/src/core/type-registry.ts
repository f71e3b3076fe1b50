import type { AllowedData } from '../types/port';

/**
 * Checks whether a runtime value belongs to a type tag
 */
export type TypePredicate = (value: unknown) => boolean;

interface TypeEntry {
  readonly predicate: TypePredicate;
  readonly supertypes: readonly string[];
}

/**
 * Registry of data type tags used by port type constraints.
 *
 * A tag is accepted by itself and by every transitive supertype.
 * Unions are written as arrays of tags; `null` means "anything".
 */
export class DataTypeRegistry {
  private readonly types = new Map<string, TypeEntry>();

  /**
   * Registers a type tag
   * @param tag Tag name
   * @param predicate Runtime check for values of this type
   * @param supertypes Tags that accept this one
   * @throws Error if tag is already registered
   */
  register(tag: string, predicate: TypePredicate, supertypes: readonly string[] = []): this {
    if (this.types.has(tag)) {
      throw new Error(`Data type '${tag}' is already registered`);
    }
    this.types.set(tag, { predicate, supertypes: [...supertypes] });
    return this;
  }

  has(tag: string): boolean {
    return this.types.has(tag);
  }

  tags(): string[] {
    return [...this.types.keys()];
  }

  /**
   * Whether an input declared as `inputType` accepts data from an output
   * declared as `outputType`
   */
  accepts(inputType: AllowedData, outputType: AllowedData): boolean {
    if (inputType === null) {
      return true;
    }
    if (outputType === null) {
      return false;
    }

    const outputs = typeof outputType === 'string' ? [outputType] : outputType;
    const inputs = typeof inputType === 'string' ? [inputType] : inputType;

    return outputs.every(out => inputs.some(inp => this.isSubtype(out, inp)));
  }

  /**
   * Whether a runtime value satisfies a declared type
   */
  isValue(type: AllowedData, value: unknown): boolean {
    if (type === null) {
      return true;
    }

    const tags = typeof type === 'string' ? [type] : type;
    return tags.some(tag => {
      const entry = this.types.get(tag);
      return entry ? entry.predicate(value) : false;
    });
  }

  /**
   * Whether `tag` equals `ancestor` or reaches it through supertypes
   */
  isSubtype(tag: string, ancestor: string): boolean {
    const seen = new Set<string>();
    const pending = [tag];

    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || seen.has(current)) {
        continue;
      }
      if (current === ancestor) {
        return true;
      }
      seen.add(current);
      pending.push(...(this.types.get(current)?.supertypes ?? []));
    }

    return false;
  }
}

/**
 * Registry preloaded with the built-in tags
 */
export function createDefaultTypeRegistry(): DataTypeRegistry {
  return new DataTypeRegistry()
    .register('number', value => typeof value === 'number')
    .register('integer', value => Number.isInteger(value), ['number'])
    .register('boolean', value => typeof value === 'boolean')
    .register('sequence', value => typeof value === 'string' || Array.isArray(value))
    .register('string', value => typeof value === 'string', ['sequence'])
    .register('array', value => Array.isArray(value), ['sequence'])
    .register('object', value => typeof value === 'object' && value !== null && !Array.isArray(value))
    .register('function', value => typeof value === 'function');
}
