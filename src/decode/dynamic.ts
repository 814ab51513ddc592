/**
 * Dynamic destinations: abstract interface types resolved through the type
 * registry or by node kind, raw node access and leaf types with their own
 * decode hook.
 */

import type { Node } from "../ast/nodes";
import { TJSONDecodeError } from "../errors/types";
import { ArrayType, RecordType } from "./containers";
import type { DecodeContext, DecodeOptions } from "./options";
import { BooleanType, FloatType, StringType } from "./scalars";
import { runHook } from "./struct";
import { Type } from "./type";

export type JSONValue =
  | null
  | boolean
  | number
  | string
  | JSONValue[]
  | { [key: string]: JSONValue };

/**
 * Shallow check: containers are accepted without inspecting their contents
 */
export function isJSONValue(value: unknown): value is JSONValue {
  if (value === null || Array.isArray(value)) {
    return true;
  }
  switch (typeof value) {
    case "boolean":
    case "number":
    case "string":
      return true;
    case "object":
      return Object.getPrototypeOf(value) === Object.prototype;
    default:
      return false;
  }
}

/**
 * Abstract destination. A registered constructor builds the value; without
 * one, a default concrete type is chosen from the node kind. Either result
 * has to pass `guard`.
 */
export class InterfaceType<T> extends Type<T | null> {
  readonly kind = "interface";
  readonly guard: (value: unknown) => value is T;

  constructor(name: string, guard: (value: unknown) => value is T) {
    super(name);
    this.guard = guard;
  }

  zero(): T | null {
    return null;
  }

  decodeNode(
    node: Node,
    _current: T | null | undefined,
    options: DecodeOptions
  ): T | null {
    if (node.type === "null") {
      return null;
    }
    const { context } = options;
    const constructor = context.typeRegistry.lookup(this);
    const value = constructor
      ? runHook("ConstructorFailed", "Constructor", this.name, () =>
          constructor(node, context)
        )
      : defaultType(node).decodeNode(node, undefined, options);
    if (!this.guard(value)) {
      throw new TJSONDecodeError(
        "IncompatibleTypes",
        `Incompatible types: ${describeValue(value)} is not ${this.name}`,
        { source: node.type, destination: this.name }
      );
    }
    return value;
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  if (typeof value === "object") {
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype === Object.prototype || prototype === null) {
      return "object";
    }
    return value.constructor.name;
  }
  return typeof value;
}

export const anyType: InterfaceType<JSONValue> = new InterfaceType(
  "any",
  isJSONValue
);

const defaults = {
  number: new FloatType(64),
  string: new StringType(),
  boolean: new BooleanType(),
  object: new RecordType(anyType),
  array: new ArrayType(anyType),
};

function defaultType(node: Node): Type<unknown> {
  switch (node.type) {
    case "number":
      return defaults.number;
    case "string":
      return defaults.string;
    case "boolean":
      return defaults.boolean;
    case "object":
      return defaults.object;
    case "array":
      return defaults.array;
    default:
      return anyType;
  }
}

/**
 * Stores the source node itself
 */
export class NodeType extends Type<Node | null> {
  readonly kind = "node";

  constructor() {
    super("node");
  }

  zero(): Node | null {
    return null;
  }

  decodeNode(node: Node): Node | null {
    return node.type === "null" ? null : node;
  }
}

export interface CustomTypeDefinition<T> {
  name: string;
  zero: () => T;
  /**
   * Build the value from a non-null node. Nested decode calls should pass
   * `withContext(context)`.
   */
  decodeJSON: (node: Node, current: T | undefined, context: DecodeContext) => T;
}

/**
 * Leaf type with its own decode hook
 */
export class CustomType<T> extends Type<T> {
  readonly kind = "custom";
  private readonly definition: CustomTypeDefinition<T>;

  constructor(definition: CustomTypeDefinition<T>) {
    super(definition.name);
    this.definition = definition;
  }

  zero(): T {
    return this.definition.zero();
  }

  decodeNode(node: Node, current: T | undefined, options: DecodeOptions): T {
    if (node.type === "null") {
      return this.zero();
    }
    return runHook("DecodeHookFailed", "decodeJSON", this.name, () =>
      this.definition.decodeJSON(node, current, options.context)
    );
  }
}
