import type {
  ArrayNode,
  BooleanNode,
  Node,
  NumberNode,
  ObjectNode,
  StringNode,
} from "../ast/nodes";
import type { DecodeErrorCode } from "../errors/types";
import { TJSONDecodeError } from "../errors/types";
import type { DecodeOptions } from "./options";

export type TypeKind =
  | "int"
  | "int64"
  | "float"
  | "bigint"
  | "decimal"
  | "time"
  | "string"
  | "bytes"
  | "boolean"
  | "struct"
  | "record"
  | "map"
  | "array"
  | "fixedArray"
  | "optional"
  | "lazy"
  | "interface"
  | "node"
  | "custom";

/**
 * A mutable destination reference
 */
export interface Slot<T> {
  value: T;
}

export function ref<T>(value: T): Slot<T> {
  return { value };
}

/**
 * Field declaration of a record type
 */
export interface FieldSpec<V> {
  readonly type: Type<V>;
  readonly tag?: string;
  readonly embedded: boolean;
}

export type FieldEntry = readonly [key: string, spec: FieldSpec<unknown>];

export function conversionError(
  code: DecodeErrorCode,
  source: string,
  destination: string
): TJSONDecodeError {
  return new TJSONDecodeError(
    code,
    `Cannot convert ${source} to ${destination}`,
    { source, destination }
  );
}

/**
 * Destination type descriptor.
 *
 * `decodeNode` is the shared dispatcher: a null node resets the destination
 * to `zero()`, any other node is routed to the `from*` hook matching its
 * kind. Subclasses override the hooks they support; the defaults fail with
 * the conversion error of the node kind.
 */
export abstract class Type<T> {
  abstract readonly kind: TypeKind;
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  abstract zero(): T;

  decodeNode(node: Node, current: T | undefined, options: DecodeOptions): T {
    if (node.type === "null") {
      return this.zero();
    }
    return node.accept(this, current, options);
  }

  /** Declared fields of a record type */
  get structFields(): readonly FieldEntry[] | undefined {
    return;
  }

  /** Target of an optional or deferred indirection */
  get indirect(): Type<unknown> | undefined {
    return;
  }

  fromNumber(
    _node: NumberNode,
    _current: T | undefined,
    _options: DecodeOptions
  ): T {
    throw conversionError("CannotConvertNumber", "number", this.name);
  }

  fromString(
    _node: StringNode,
    _current: T | undefined,
    _options: DecodeOptions
  ): T {
    throw conversionError("CannotConvertString", "string", this.name);
  }

  fromObject(
    _node: ObjectNode,
    _current: T | undefined,
    _options: DecodeOptions
  ): T {
    throw new TJSONDecodeError(
      "StructOrMapExpected",
      `Struct or map expected: ${this.name}`,
      { source: "object", destination: this.name }
    );
  }

  fromArray(
    _node: ArrayNode,
    _current: T | undefined,
    _options: DecodeOptions
  ): T {
    throw new TJSONDecodeError(
      "SequenceExpected",
      `Array or fixed-size array expected: ${this.name}`,
      { source: "array", destination: this.name }
    );
  }

  fromBoolean(
    _node: BooleanNode,
    _current: T | undefined,
    _options: DecodeOptions
  ): T {
    throw conversionError("CannotConvertBoolean", "boolean", this.name);
  }
}
