/**
 * Builders for destination type descriptors.
 *
 * @example
 * ```ts
 * const Point = t.struct("Point", () => ({ x: 0, y: 0 }), {
 *   x: t.field(t.int32()),
 *   y: t.field(t.int32()),
 * });
 * const p = unmarshal('{"x":1,"y":2}', Point);
 * ```
 */

import type { Node } from "../ast/nodes";
import {
  ArrayType,
  FixedArrayType,
  LazyType,
  MapType,
  OptionalType,
  RecordType,
} from "./containers";
import {
  anyType,
  CustomType,
  type CustomTypeDefinition,
  InterfaceType,
  type JSONValue,
  NodeType,
} from "./dynamic";
import {
  BigIntType,
  BooleanType,
  BytesType,
  DecimalType,
  FloatType,
  Int64Type,
  IntType,
  StringType,
  TimeType,
} from "./scalars";
import { type StructFields, StructType } from "./struct";
import type { FieldSpec, Type } from "./type";

/** Value type described by a descriptor */
export type Infer<D> = D extends Type<infer T> ? T : never;

const nodeType = new NodeType();

function field<V>(type: Type<V>, tag?: string): FieldSpec<V> {
  return { type, tag, embedded: false };
}

/**
 * Embedded struct: without a tag name its fields are merged into the
 * enclosing struct
 */
function embed<V>(type: Type<V>, tag?: string): FieldSpec<V> {
  return { type, tag, embedded: true };
}

function iface<T>(
  name: string,
  guard: (value: unknown) => value is T
): InterfaceType<T> {
  return new InterfaceType(name, guard);
}

export const t = {
  int8: () => new IntType(8, true),
  int16: () => new IntType(16, true),
  int32: () => new IntType(32, true),
  uint8: () => new IntType(8, false),
  uint16: () => new IntType(16, false),
  uint32: () => new IntType(32, false),
  /** Safe integer, saturating at `Number.MAX_SAFE_INTEGER` */
  int: () => new IntType(53, true),
  uint: () => new IntType(53, false),
  int64: () => new Int64Type(true),
  uint64: () => new Int64Type(false),
  float32: () => new FloatType(32),
  float64: () => new FloatType(64),
  bigint: () => new BigIntType(),
  decimal: () => new DecimalType(),
  time: () => new TimeType(),
  string: () => new StringType(),
  bytes: () => new BytesType(),
  boolean: () => new BooleanType(),

  struct: <T extends object>(
    name: string,
    create: () => T,
    fields: StructFields<T> | (() => StructFields<T>)
  ): StructType<T> => new StructType(name, create, fields),
  field,
  embed,

  record: <V>(value: Type<V>): RecordType<V> => new RecordType(value),
  map: <K, V>(key: Type<K>, value: Type<V>): MapType<K, V> =>
    new MapType(key, value),
  array: <E>(element: Type<E>): ArrayType<E> => new ArrayType(element),
  fixedArray: <E>(element: Type<E>, length: number): FixedArrayType<E> =>
    new FixedArrayType(element, length),
  optional: <T>(inner: Type<T>): OptionalType<T> => new OptionalType(inner),
  lazy: <T>(resolve: () => Type<T>, name?: string): LazyType<T> =>
    new LazyType(resolve, name),

  interface: iface,
  any: (): InterfaceType<JSONValue> => anyType,
  node: (): Type<Node | null> => nodeType,
  custom: <T>(definition: CustomTypeDefinition<T>): CustomType<T> =>
    new CustomType(definition),
};
