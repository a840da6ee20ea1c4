export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  constructor(readonly options: { nonEmpty?: boolean } = {}) {}

  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }
    if (this.options.nonEmpty && value.trim().length === 0) {
      throw new TypeError(`${path} must not be empty`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  constructor(readonly options: { integer?: boolean } = {}) {}

  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a finite number`);
    }
    if (this.options.integer && !Number.isInteger(value)) {
      throw new TypeError(`${path} must be an integer`);
    }

    return value;
  }
}

class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    return this.inner.parse(value, path);
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item: unknown, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

type Shape = Record<string, JotSchema<unknown>>;

type InferShape<S extends Shape> = { [K in keyof S]: InferJot<S[K]> };

class ObjectNode<S extends Shape> implements JotSchema<InferShape<S>> {
  constructor(readonly shape: S) {}

  parse(value: unknown, path: string = 'value'): InferShape<S> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const record: Record<string, unknown> = { ...value };
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(this.shape)) {
      const node = this.shape[key];
      if (node) {
        result[key] = node.parse(record[key], `${path}.${key}`);
      }
    }

    return result as InferShape<S>;
  }
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (options?: { nonEmpty?: boolean }): JotSchema<string> => new StringNode(options),
  number: (options?: { integer?: boolean }): JotSchema<number> => new NumberNode(options),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  object: <S extends Shape>(shape: S): JotSchema<InferShape<S>> => new ObjectNode(shape),
};

export function parseJson<T>(schema: JotSchema<T>, raw: string, label: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`${label} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return schema.parse(parsed, label);
}
