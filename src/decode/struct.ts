import type { Node, ObjectNode, StringNode } from "../ast/nodes";
import type { DecodeErrorCode } from "../errors/types";
import { errorMessage, isTJSONError, TJSONDecodeError } from "../errors/types";
import {
  fieldTable,
  parseFieldOptions,
  reportEmbeddingCycles,
  type StructField,
} from "../schema/fields";
import { childOptions, type DecodeOptions } from "./options";
import { type FieldEntry, type FieldSpec, Type } from "./type";

/**
 * Struct instances implementing this take over decoding from any non-null
 * node
 */
export interface NodeDecoder {
  decodeJSON(node: Node): void;
}

/**
 * Struct instances implementing this can be decoded from a string node
 */
export interface TextUnmarshaler {
  unmarshalText(text: string): void;
}

export function isNodeDecoder(value: unknown): value is NodeDecoder {
  return (
    typeof value === "object" &&
    value !== null &&
    "decodeJSON" in value &&
    typeof value.decodeJSON === "function"
  );
}

export function isTextUnmarshaler(value: unknown): value is TextUnmarshaler {
  return (
    typeof value === "object" &&
    value !== null &&
    "unmarshalText" in value &&
    typeof value.unmarshalText === "function"
  );
}

/**
 * Field declarations of a struct, keyed by property name in declaration
 * order
 */
export type StructFields<T> = {
  [K in keyof T & string]?: FieldSpec<T[K]>;
};

type FieldMap = Readonly<Record<string, FieldSpec<unknown> | undefined>>;

/**
 * Rethrow library errors unchanged, wrap anything else with `code`
 */
export function runHook<R>(
  code: DecodeErrorCode,
  label: string,
  destination: string,
  fn: () => R
): R {
  try {
    return fn();
  } catch (error) {
    if (isTJSONError(error)) {
      throw error;
    }
    throw new TJSONDecodeError(
      code,
      `${label} failed for ${destination}: ${errorMessage(error)}`,
      { destination, cause: error }
    );
  }
}

function holderOf(root: object, field: StructField): object {
  let holder = root;
  for (const hop of field.path) {
    const value: unknown = Reflect.get(holder, hop.key);
    if (typeof value === "object" && value !== null) {
      holder = value;
      continue;
    }
    const created: unknown = hop.struct.zero();
    if (typeof created !== "object" || created === null) {
      throw new TJSONDecodeError(
        "StructOrMapExpected",
        `Struct or map expected: ${hop.struct.name}`,
        { destination: hop.struct.name }
      );
    }
    Reflect.set(holder, hop.key, created);
    holder = created;
  }
  return holder;
}

export class StructType<T extends object> extends Type<T> {
  readonly kind = "struct";
  private readonly create: () => T;
  private readonly source: FieldMap | (() => FieldMap);
  private entries?: readonly FieldEntry[];

  constructor(
    name: string,
    create: () => T,
    fields: StructFields<T> | (() => StructFields<T>)
  ) {
    super(name);
    this.create = create;
    this.source = fields;
  }

  get structFields(): readonly FieldEntry[] {
    if (!this.entries) {
      const fields =
        typeof this.source === "function" ? this.source() : this.source;
      const entries: FieldEntry[] = [];
      for (const [key, spec] of Object.entries(fields)) {
        if (spec) {
          entries.push([key, spec]);
        }
      }
      this.entries = entries;
    }
    return this.entries;
  }

  zero(): T {
    return runHook("ConstructorFailed", "Constructor", this.name, this.create);
  }

  decodeNode(node: Node, current: T | undefined, options: DecodeOptions): T {
    if (node.type === "null") {
      return this.zero();
    }
    const target = current ?? this.zero();
    if (isNodeDecoder(target)) {
      runHook("DecodeHookFailed", "decodeJSON", this.name, () =>
        target.decodeJSON(node)
      );
      return target;
    }
    return node.accept(this, target, options);
  }

  fromString(
    node: StringNode,
    current: T | undefined,
    options: DecodeOptions
  ): T {
    const target = current ?? this.zero();
    if (!isTextUnmarshaler(target)) {
      return super.fromString(node, current, options);
    }
    runHook("TextUnmarshalFailed", "unmarshalText", this.name, () =>
      target.unmarshalText(node.value)
    );
    return target;
  }

  fromObject(
    node: ObjectNode,
    current: T | undefined,
    options: DecodeOptions
  ): T {
    const target = current ?? this.zero();
    const table = fieldTable(this);
    const { context } = options;
    reportEmbeddingCycles(table, context);

    for (const [key, child] of node) {
      const field = table.fields.get(key);
      if (!field) {
        if (context.disallowUnknownFields) {
          throw new TJSONDecodeError(
            "UndefinedField",
            `Undefined field '${key}' in ${this.name}`,
            { source: "object", destination: this.name }
          );
        }
        continue;
      }
      const holder = holderOf(target, field);
      const fieldOptions = childOptions(
        options,
        parseFieldOptions(field.tag, context)
      );
      const value = field.type.decodeNode(
        child,
        Reflect.get(holder, field.key),
        fieldOptions
      );
      Reflect.set(holder, field.key, value);
    }
    return target;
  }
}
