/**
 * Decode configuration: option functions applied left to right over a
 * mutable options record, plus the call-wide context shared by every nested
 * decode call.
 */

import { resolveMaxDepth } from "../core/config";
import type { OnErrorFn } from "../core/types";
import { TJSONDecodeError } from "../errors/types";
import type { Encoding } from "../registry/encoding";
import type { FieldTable } from "../schema/fields";
import {
  defaultEncodingRegistry,
  type EncodingRegistry,
} from "../registry/encoding-registry";
import {
  defaultTypeRegistry,
  type TypeRegistry,
} from "../registry/type-registry";

export const DEFAULT_MAX_DECODE_DEPTH = 512;

/**
 * Call-wide decode policy. Propagates unchanged through nested decode calls.
 */
export class DecodeContext {
  disallowUnknownFields = false;
  types?: TypeRegistry;
  encodings?: EncodingRegistry;
  onError?: OnErrorFn;
  maxDepth = DEFAULT_MAX_DECODE_DEPTH;
  /** Struct layouts whose embedding cycles were already reported */
  readonly reportedCycles = new WeakSet<FieldTable>();

  get typeRegistry(): TypeRegistry {
    return this.types ?? defaultTypeRegistry;
  }

  get encodingRegistry(): EncodingRegistry {
    return this.encodings ?? defaultEncodingRegistry;
  }
}

export interface DecodeOptions {
  context: DecodeContext;
  /** Treat the destination as textual */
  asString: boolean;
  /** Byte encoding scheme, or the name of a registered one */
  encoding?: Encoding | string;
  /** Options applied to container elements, one level down */
  element?: DecodeOptions;
  /** Nesting level of the destination being decoded */
  depth: number;
}

export type DecodeOption = (options: DecodeOptions) => void;

function emptyOptions(): DecodeOptions {
  return { context: new DecodeContext(), asString: false, depth: 0 };
}

function copyOptions(
  source: DecodeOptions | undefined
): DecodeOptions | undefined {
  if (!source) {
    return;
  }
  return {
    context: source.context,
    asString: source.asString,
    encoding: source.encoding,
    element: copyOptions(source.element),
    depth: source.depth,
  };
}

function applyOptions(
  target: DecodeOptions,
  options: readonly DecodeOption[]
): DecodeOptions {
  for (const fn of options) {
    fn(target);
  }
  return target;
}

export function buildOptions(options: readonly DecodeOption[]): DecodeOptions {
  return applyOptions(emptyOptions(), options);
}

/**
 * Options for a container element or record field: the parent's element
 * options, the parent's context, then the field-level options.
 */
export function childOptions(
  parent: DecodeOptions,
  fieldOptions: readonly DecodeOption[] = []
): DecodeOptions {
  const depth = parent.depth + 1;
  if (depth > parent.context.maxDepth) {
    throw new TJSONDecodeError(
      "MaxDepthExceeded",
      `Maximum decode depth of ${parent.context.maxDepth} exceeded`
    );
  }
  const element = parent.element;
  const child: DecodeOptions = {
    context: parent.context,
    asString: element?.asString ?? false,
    encoding: element?.encoding,
    element: copyOptions(element?.element),
    depth,
  };
  return applyOptions(child, fieldOptions);
}

/**
 * Resolve the explicit encoding of a decode call against the active registry
 */
export function resolveEncoding(
  options: DecodeOptions,
  destination: string
): Encoding | undefined {
  const { encoding } = options;
  if (encoding === undefined || typeof encoding !== "string") {
    return encoding;
  }
  const found = options.context.encodingRegistry.lookup(encoding);
  if (!found) {
    throw new TJSONDecodeError(
      "UnknownEncoding",
      `Unknown encoding '${encoding}'`,
      { source: "string", destination }
    );
  }
  return found;
}

// Node-scoped options

/**
 * Decode numbers, booleans and integers from their textual form and copy
 * strings into byte sequences without a binary encoding
 */
export const asString: DecodeOption = (options) => {
  options.asString = true;
};

export function withEncoding(encoding: Encoding | string): DecodeOption {
  return (options) => {
    options.encoding = encoding;
  };
}

/**
 * Options for container elements. Repeated use accumulates. Context-scoped
 * options given here still apply to the whole call.
 */
export function elementOptions(...ops: DecodeOption[]): DecodeOption {
  return (options) => {
    options.element ??= emptyOptions();
    options.element.context = options.context;
    applyOptions(options.element, ops);
  };
}

// Context-scoped options

export function withTypes(registry: TypeRegistry): DecodeOption {
  return (options) => {
    options.context.types = registry;
  };
}

export function withEncodings(registry: EncodingRegistry): DecodeOption {
  return (options) => {
    options.context.encodings = registry;
  };
}

export const disallowUnknownFields: DecodeOption = (options) => {
  options.context.disallowUnknownFields = true;
};

export function withOnError(onError: OnErrorFn): DecodeOption {
  return (options) => {
    options.context.onError = onError;
  };
}

export function withMaxDepth(maxDepth: number): DecodeOption {
  const resolved = resolveMaxDepth(maxDepth);
  return (options) => {
    options.context.maxDepth = resolved;
  };
}

/**
 * Pass the context of an enclosing decode call, e.g. from a user type
 * constructor
 */
export function withContext(context: DecodeContext): DecodeOption {
  return (options) => {
    options.context = context;
  };
}
