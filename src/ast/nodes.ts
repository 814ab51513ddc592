/**
 * JSON AST. Nodes are immutable and form a pure tree.
 */

import { Decimal } from "decimal.js";

import type { DecodeOption, DecodeOptions } from "../decode/options";
import { buildOptions } from "../decode/options";
import { ref, type Slot, type Type } from "../decode/type";
import { TJSONDecodeError } from "../errors/types";
import { getDebugLevel, logDecodeFailure } from "../utils/debug";

export type NodeKind =
  | "number"
  | "string"
  | "object"
  | "array"
  | "boolean"
  | "null";

function checkSlot<T>(
  target: Slot<T> | null | undefined,
  type: Type<T>
): Slot<T> {
  if (target === null || target === undefined) {
    throw new TJSONDecodeError(
      "NilDestination",
      `Nil destination for ${type.name}`,
      { destination: type.name }
    );
  }
  if (typeof target !== "object" || !("value" in target)) {
    throw new TJSONDecodeError(
      "PointerExpected",
      `Reference expected for ${type.name}: ${typeof target}`,
      { destination: type.name }
    );
  }
  return target;
}

export abstract class Node {
  abstract readonly type: NodeKind;

  /**
   * Route this node to the conversion hook of `type` matching its kind
   */
  abstract accept<T>(
    type: Type<T>,
    current: T | undefined,
    options: DecodeOptions
  ): T;

  /**
   * Decode the node into the value referenced by `target`
   */
  decode<T>(
    target: Slot<T> | null | undefined,
    type: Type<T>,
    ...options: DecodeOption[]
  ): void {
    const slot = checkSlot(target, type);
    try {
      slot.value = type.decodeNode(this, slot.value, buildOptions(options));
    } catch (error) {
      if (getDebugLevel() === "decode") {
        logDecodeFailure({ source: this.type, destination: type.name, error });
      }
      throw error;
    }
  }

  /**
   * Decode the node into a fresh zero value of `type`
   */
  decodeAs<T>(type: Type<T>, ...options: DecodeOption[]): T {
    const slot = ref(type.zero());
    this.decode(slot, type, ...options);
    return slot.value;
  }
}

export class NumberNode extends Node {
  readonly type = "number";
  readonly value: Decimal;

  constructor(value: Decimal) {
    super();
    this.value = value;
  }

  static of(value: Decimal.Value): NumberNode {
    return new NumberNode(new Decimal(value));
  }

  accept<T>(type: Type<T>, current: T | undefined, options: DecodeOptions): T {
    return type.fromNumber(this, current, options);
  }

  toString(): string {
    return this.value.toString();
  }
}

export class StringNode extends Node {
  readonly type = "string";
  readonly value: string;

  constructor(value: string) {
    super();
    this.value = value;
  }

  accept<T>(type: Type<T>, current: T | undefined, options: DecodeOptions): T {
    return type.fromString(this, current, options);
  }

  toString(): string {
    return this.value;
  }
}

export class BooleanNode extends Node {
  readonly type = "boolean";
  readonly value: boolean;

  constructor(value: boolean) {
    super();
    this.value = value;
  }

  accept<T>(type: Type<T>, current: T | undefined, options: DecodeOptions): T {
    return type.fromBoolean(this, current, options);
  }

  toString(): string {
    return String(this.value);
  }
}

export class NullNode extends Node {
  readonly type = "null";

  accept<T>(type: Type<T>): T {
    return type.zero();
  }

  toString(): string {
    return "null";
  }
}

export const NULL: NullNode = new NullNode();

export class ArrayNode extends Node implements Iterable<Node> {
  readonly type = "array";
  readonly elements: readonly Node[];

  constructor(elements: readonly Node[]) {
    super();
    this.elements = Object.freeze([...elements]);
  }

  get length(): number {
    return this.elements.length;
  }

  at(index: number): Node | undefined {
    return this.elements[index];
  }

  [Symbol.iterator](): Iterator<Node> {
    return this.elements[Symbol.iterator]();
  }

  accept<T>(type: Type<T>, current: T | undefined, options: DecodeOptions): T {
    return type.fromArray(this, current, options);
  }
}

export interface ObjectField {
  readonly key: string;
  readonly value: Node;
}

/**
 * JSON object with unique keys in first-occurrence order
 */
export class ObjectNode extends Node implements Iterable<[string, Node]> {
  readonly type = "object";
  private readonly fields: readonly ObjectField[];
  private readonly index: ReadonlyMap<string, number>;

  /**
   * Duplicate keys keep the position of their first occurrence and the value
   * of their last one
   */
  constructor(fields: Iterable<readonly [string, Node]> = []) {
    super();
    const list: ObjectField[] = [];
    const index = new Map<string, number>();
    for (const [key, value] of fields) {
      const at = index.get(key);
      if (at === undefined) {
        index.set(key, list.length);
        list.push({ key, value });
      } else {
        list[at] = { key, value };
      }
    }
    this.fields = Object.freeze(list);
    this.index = index;
  }

  get numFields(): number {
    return this.fields.length;
  }

  keys(): string[] {
    return this.fields.map((f) => f.key);
  }

  /**
   * i-th field, or undefined past the last one
   */
  field(i: number): ObjectField | undefined {
    return this.fields[i];
  }

  fieldByName(key: string): Node | undefined {
    const at = this.index.get(key);
    return at === undefined ? undefined : this.fields[at]?.value;
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  *entries(): IterableIterator<[string, Node]> {
    for (const { key, value } of this.fields) {
      yield [key, value];
    }
  }

  [Symbol.iterator](): Iterator<[string, Node]> {
    return this.entries();
  }

  accept<T>(type: Type<T>, current: T | undefined, options: DecodeOptions): T {
    return type.fromObject(this, current, options);
  }
}

/**
 * Incremental construction of object nodes, e.g. in user type constructors
 */
export class ObjectBuilder {
  private readonly fields: [string, Node][] = [];

  set(key: string, value: Node): this {
    this.fields.push([key, value]);
    return this;
  }

  build(): ObjectNode {
    return new ObjectNode(this.fields);
  }
}
