export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new TypeError(`${path} must be a number`);
    }

    return value;
  }
}

class BooleanNode implements JotSchema<boolean> {
  parse(value: unknown, path: string = 'value'): boolean {
    if (typeof value !== 'boolean') {
      throw new TypeError(`${path} must be a boolean`);
    }

    return value;
  }
}

class EnumNode<TValue extends readonly string[]> implements JotSchema<TValue[number]> {
  constructor(readonly values: TValue) {}

  parse(value: unknown, path: string = 'value'): TValue[number] {
    const match = this.values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new TypeError(`${path} must be one of ${this.values.join(', ')}`);
    }

    return match;
  }
}

class LiteralNode<TValue extends string | number | boolean> implements JotSchema<TValue> {
  constructor(readonly expected: TValue) {}

  parse(value: unknown, path: string = 'value'): TValue {
    if (value !== this.expected) {
      throw new TypeError(`${path} must be ${JSON.stringify(this.expected)}`);
    }

    return this.expected;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class RecordNode<T> implements JotSchema<Record<string, T>> {
  constructor(readonly valueNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): Record<string, T> {
    if (!isPlainObject(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, T> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = this.valueNode.parse(entry, `${path}.${key}`);
    }
    return result;
  }
}

class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    return value === undefined ? undefined : this.inner.parse(value, path);
  }
}

class NullableNode<T> implements JotSchema<T | null> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | null {
    return value === null ? null : this.inner.parse(value, path);
  }
}

class UnknownNode implements JotSchema<unknown> {
  parse(value: unknown): unknown {
    return value;
  }
}

export interface ObjectNodeOptions {
  /**
   * Copy keys the shape does not name into the result instead of dropping them.
   */
  passthrough?: boolean;
}

type ObjectShape = Record<string, JotSchema<unknown>>;

type InferShape<Shape extends ObjectShape> = { [K in keyof Shape]: InferJot<Shape[K]> };

class ObjectNode<Shape extends ObjectShape> implements JotSchema<InferShape<Shape>> {
  constructor(readonly shape: Shape, readonly options: ObjectNodeOptions = {}) {}

  parse(value: unknown, path: string = 'value'): InferShape<Shape> {
    if (!isPlainObject(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, unknown> = this.options.passthrough ? { ...value } : {};
    for (const [key, node] of Object.entries(this.shape)) {
      const parsed = node.parse(value[key], `${path}.${key}`);
      if (parsed === undefined) {
        delete result[key];
      } else {
        result[key] = parsed;
      }
    }

    return result as InferShape<Shape>;
  }
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (): JotSchema<string> => new StringNode(),
  number: (): JotSchema<number> => new NumberNode(),
  boolean: (): JotSchema<boolean> => new BooleanNode(),
  enum: <TValue extends readonly string[]>(values: TValue): JotSchema<TValue[number]> => new EnumNode(values),
  literal: <TValue extends string | number | boolean>(value: TValue): JotSchema<TValue> => new LiteralNode(value),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  record: <T>(schema: JotSchema<T>): JotSchema<Record<string, T>> => new RecordNode(schema),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  nullable: <T>(schema: JotSchema<T>): JotSchema<T | null> => new NullableNode(schema),
  unknown: (): JotSchema<unknown> => new UnknownNode(),
  object: <Shape extends ObjectShape>(shape: Shape, options?: ObjectNodeOptions) => new ObjectNode(shape, options),
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

