/**
 * Struct introspection: field tag parsing and the flattened field table of a
 * struct type, with embedded structs merged in.
 */

import type { DecodeContext, DecodeOption } from "../decode/options";
import { asString, elementOptions, withEncoding } from "../decode/options";
import type { Type } from "../decode/type";
import type { EncodingRegistry } from "../registry/encoding-registry";
import { logEmbeddingCycle } from "../utils/debug";

export interface TagOptions {
  readonly asString: boolean;
  /** Candidate encoding names, in tag order */
  readonly encodings: readonly string[];
}

export interface ParsedTag {
  /** External name; empty means the declared property name */
  readonly name: string;
  readonly ignore: boolean;
  readonly options: TagOptions;
  /** Options written as `[...]`, applied to container elements */
  readonly element?: TagOptions;
}

/**
 * One embedding step on the way from the root struct to a field
 */
export interface PathHop {
  readonly key: string;
  /** Struct stored at `key`, allocated when the property is empty */
  readonly struct: Type<unknown>;
}

export interface StructField {
  /** External (JSON) name */
  readonly name: string;
  /** Declared property name on the innermost struct */
  readonly key: string;
  readonly type: Type<unknown>;
  readonly path: readonly PathHop[];
  readonly tag: ParsedTag;
}

export interface EmbeddingCycle {
  readonly struct: string;
  readonly field: string;
}

export interface FieldTable {
  readonly fields: ReadonlyMap<string, StructField>;
  readonly cycles: readonly EmbeddingCycle[];
}

const PRIVATE_PREFIX = "_";

interface MutableTagOptions {
  asString: boolean;
  encodings: string[];
}

function emptyTagOptions(): MutableTagOptions {
  return { asString: false, encodings: [] };
}

/**
 * Parse a `name,opt,...` tag. `-` as the name ignores the field, `string`
 * selects string mode, any other option names an encoding. Either form may be
 * wrapped in brackets to apply to container elements.
 */
export function parseTag(tag = ""): ParsedTag {
  const [name = "", ...rest] = tag.split(",");
  const options = emptyTagOptions();
  let element: MutableTagOptions | undefined;

  for (const raw of rest) {
    let option = raw.trim();
    let target = options;
    if (option.startsWith("[")) {
      if (!option.endsWith("]")) {
        continue;
      }
      option = option.slice(1, -1).trim();
      element ??= emptyTagOptions();
      target = element;
    }
    if (option === "") {
      continue;
    }
    if (option === "string") {
      target.asString = true;
    } else {
      target.encodings.push(option);
    }
  }

  return { name, ignore: name === "-", options, element };
}

function tagDecodeOptions(
  options: TagOptions,
  registry: EncodingRegistry
): DecodeOption[] {
  const out: DecodeOption[] = [];
  if (options.asString) {
    out.push(asString);
  }
  for (const name of options.encodings) {
    // unregistered names are ignored
    const encoding = registry.lookup(name);
    if (encoding) {
      out.push(withEncoding(encoding));
    }
  }
  return out;
}

/**
 * Decode options carried by a field's tag, resolved against the active
 * encoding registry
 */
export function parseFieldOptions(
  tag: ParsedTag,
  context: DecodeContext
): DecodeOption[] {
  const registry = context.encodingRegistry;
  const out = tagDecodeOptions(tag.options, registry);
  if (tag.element) {
    const element = tagDecodeOptions(tag.element, registry);
    if (element.length > 0) {
      out.push(elementOptions(...element));
    }
  }
  return out;
}

/**
 * Struct reached through an embedded field, looking through optional and
 * deferred indirections
 */
function embeddedStruct(type: Type<unknown>): Type<unknown> | undefined {
  let current: Type<unknown> | undefined = type;
  while (current) {
    if (current.structFields) {
      return current;
    }
    current = current.indirect;
  }
  return;
}

function collectFields(
  struct: Type<unknown>,
  path: readonly PathHop[],
  visiting: readonly Type<unknown>[],
  out: Map<string, StructField>,
  cycles: EmbeddingCycle[]
): void {
  for (const [key, spec] of struct.structFields ?? []) {
    if (key.startsWith(PRIVATE_PREFIX)) {
      continue;
    }
    const tag = parseTag(spec.tag);
    if (tag.ignore) {
      continue;
    }

    const target = spec.embedded ? embeddedStruct(spec.type) : undefined;
    if (target && tag.name === "") {
      if (visiting.includes(target)) {
        cycles.push({ struct: struct.name, field: key });
        logEmbeddingCycle(struct.name, key);
        continue;
      }
      collectFields(
        target,
        [...path, { key, struct: target }],
        [...visiting, target],
        out,
        cycles
      );
      continue;
    }

    addField(out, {
      name: tag.name || key,
      key,
      type: spec.type,
      path,
      tag,
    });
  }
}

/**
 * Shallower fields win; at equal depth the first declared one stays
 */
function addField(out: Map<string, StructField>, field: StructField): void {
  const previous = out.get(field.name);
  if (previous && previous.path.length <= field.path.length) {
    return;
  }
  out.set(field.name, field);
}

const tables = new WeakMap<Type<unknown>, FieldTable>();

export function fieldTable(struct: Type<unknown>): FieldTable {
  const cached = tables.get(struct);
  if (cached) {
    return cached;
  }
  const fields = new Map<string, StructField>();
  const cycles: EmbeddingCycle[] = [];
  collectFields(struct, [], [struct], fields, cycles);
  const table: FieldTable = { fields, cycles };
  tables.set(struct, table);
  return table;
}

/**
 * Fields that take part in decoding, after flattening embedded structs and
 * resolving name conflicts
 */
export function visibleFields(struct: Type<unknown>): StructField[] {
  return [...fieldTable(struct).fields.values()];
}

export function reportEmbeddingCycles(
  table: FieldTable,
  context: DecodeContext
): void {
  if (!context.onError || context.reportedCycles.has(table)) {
    return;
  }
  context.reportedCycles.add(table);
  for (const cycle of table.cycles) {
    context.onError(
      `Embedding cycle detected at ${cycle.struct}.${cycle.field}`,
      { struct: cycle.struct, field: cycle.field }
    );
  }
}
