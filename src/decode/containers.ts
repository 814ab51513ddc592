import type { ArrayNode, Node, ObjectNode } from "../ast/nodes";
import { StringNode } from "../ast/nodes";
import { TJSONDecodeError } from "../errors/types";
import { childOptions, type DecodeOptions } from "./options";
import { Type } from "./type";

function decodeKey<K>(key: string, type: Type<K>, options: DecodeOptions): K {
  const keyOptions: DecodeOptions = {
    context: options.context,
    asString: true,
    depth: options.depth,
  };
  return type.decodeNode(new StringNode(key), undefined, keyOptions);
}

/**
 * String-keyed plain object. Every decode builds a fresh object.
 */
export class RecordType<V> extends Type<Record<string, V>> {
  readonly kind = "record";
  readonly value: Type<V>;

  constructor(value: Type<V>) {
    super(`record<${value.name}>`);
    this.value = value;
  }

  zero(): Record<string, V> {
    return {};
  }

  fromObject(
    node: ObjectNode,
    _current: Record<string, V> | undefined,
    options: DecodeOptions
  ): Record<string, V> {
    const out: Record<string, V> = {};
    for (const [key, child] of node) {
      const value = this.value.decodeNode(
        child,
        undefined,
        childOptions(options)
      );
      Object.defineProperty(out, key, {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  }
}

export class MapType<K, V> extends Type<Map<K, V>> {
  readonly kind = "map";
  readonly key: Type<K>;
  readonly value: Type<V>;

  constructor(key: Type<K>, value: Type<V>) {
    super(`map<${key.name}, ${value.name}>`);
    this.key = key;
    this.value = value;
  }

  zero(): Map<K, V> {
    return new Map();
  }

  fromObject(
    node: ObjectNode,
    _current: Map<K, V> | undefined,
    options: DecodeOptions
  ): Map<K, V> {
    if (this.key.kind !== "string") {
      throw new TJSONDecodeError(
        "MapKeyMustBeString",
        `Map key must be a string: ${this.key.name}`,
        { source: "object", destination: this.name }
      );
    }
    const out = new Map<K, V>();
    for (const [key, child] of node) {
      const value = this.value.decodeNode(
        child,
        undefined,
        childOptions(options)
      );
      out.set(decodeKey(key, this.key, options), value);
    }
    return out;
  }
}

export class ArrayType<E> extends Type<E[]> {
  readonly kind = "array";
  readonly element: Type<E>;

  constructor(element: Type<E>) {
    super(`${element.name}[]`);
    this.element = element;
  }

  zero(): E[] {
    return [];
  }

  fromArray(
    node: ArrayNode,
    _current: E[] | undefined,
    options: DecodeOptions
  ): E[] {
    return node.elements.map((child) =>
      this.element.decodeNode(child, undefined, childOptions(options))
    );
  }
}

/**
 * Array of a fixed length. Source elements past the length are ignored;
 * destination elements past the source length keep their value.
 */
export class FixedArrayType<E> extends Type<E[]> {
  readonly kind = "fixedArray";
  readonly element: Type<E>;
  readonly length: number;

  constructor(element: Type<E>, length: number) {
    super(`[${length}]${element.name}`);
    this.element = element;
    this.length = length;
  }

  zero(): E[] {
    return Array.from({ length: this.length }, () => this.element.zero());
  }

  fromArray(
    node: ArrayNode,
    current: E[] | undefined,
    options: DecodeOptions
  ): E[] {
    const out = this.zero();
    current?.slice(0, this.length).forEach((value, i) => {
      out[i] = value;
    });
    node.elements.slice(0, this.length).forEach((child, i) => {
      out[i] = this.element.decodeNode(child, out[i], childOptions(options));
    });
    return out;
  }
}

/**
 * Nullable indirection. A null node clears it; anything else decodes into
 * the inner type, starting from a fresh value when absent.
 */
export class OptionalType<T> extends Type<T | undefined> {
  readonly kind = "optional";
  readonly inner: Type<T>;

  constructor(inner: Type<T>) {
    super(`${inner.name}?`);
    this.inner = inner;
  }

  get indirect(): Type<unknown> {
    return this.inner;
  }

  zero(): T | undefined {
    return;
  }

  decodeNode(
    node: Node,
    current: T | undefined,
    options: DecodeOptions
  ): T | undefined {
    if (node.type === "null") {
      return;
    }
    return this.inner.decodeNode(node, current, options);
  }
}

/**
 * Deferred reference, for types that refer to themselves
 */
export class LazyType<T> extends Type<T> {
  readonly kind = "lazy";
  private readonly resolve: () => Type<T>;
  private resolved?: Type<T>;

  constructor(resolve: () => Type<T>, name = "lazy") {
    super(name);
    this.resolve = resolve;
  }

  get target(): Type<T> {
    this.resolved ??= this.resolve();
    return this.resolved;
  }

  get indirect(): Type<unknown> {
    return this.target;
  }

  zero(): T {
    return this.target.zero();
  }

  decodeNode(node: Node, current: T | undefined, options: DecodeOptions): T {
    return this.target.decodeNode(node, current, options);
  }
}
