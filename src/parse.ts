import type { Node } from "./ast/nodes";
import { JSONParser } from "./core/parser";
import type { ParseOptions } from "./core/types";
import {
  type DecodeOption,
  disallowUnknownFields,
} from "./decode/options";
import type { Slot, Type } from "./decode/type";
import { TJSONParseError } from "./errors/types";
import { logParseFailure } from "./utils/debug";

const LEADING_WHITESPACE_REGEX = /^[ \t\r\n]*/;

export type Input = string | Uint8Array;

function toText(input: Input): string {
  return typeof input === "string" ? input : Buffer.from(input).toString("utf8");
}

function checkTrailingData(text: string, parser: JSONParser): void {
  const rest = text.slice(parser.position);
  const skipped = LEADING_WHITESPACE_REGEX.exec(rest)?.[0].length ?? 0;
  if (skipped === rest.length) {
    return;
  }
  const offset = parser.offset + skipped;
  const ch = String.fromCodePoint(rest.codePointAt(skipped) ?? 0);
  throw new TJSONParseError(
    "TrailingData",
    `Unexpected data after top-level value at position ${offset}`,
    offset,
    ch
  );
}

/**
 * Parse a complete JSON text holding exactly one value
 */
export function parse(input: Input, options?: ParseOptions): Node {
  const text = toText(input);
  try {
    const parser = new JSONParser(text, options);
    const node = parser.parse();
    checkTrailingData(text, parser);
    return node;
  } catch (error) {
    logParseFailure({
      phase: "parse",
      reason: "Failed to parse JSON text",
      snippet: text,
      error,
    });
    throw error;
  }
}

/**
 * Parse a JSON text and decode it into a fresh value of `type`
 */
export function unmarshal<T>(
  input: Input,
  type: Type<T>,
  ...options: DecodeOption[]
): T {
  return parse(input).decodeAs(type, ...options);
}

/**
 * Parse a JSON text and decode it into an existing destination
 */
export function unmarshalInto<T>(
  input: Input,
  target: Slot<T>,
  type: Type<T>,
  ...options: DecodeOption[]
): void {
  parse(input).decode(target, type, ...options);
}

/**
 * Iterate over the concatenated documents of a text
 */
export function* readDocuments(
  input: Input,
  options?: ParseOptions
): Generator<Node, void, undefined> {
  const parser = new JSONParser(toText(input), options);
  for (;;) {
    const node = parser.parseNext();
    if (!node) {
      return;
    }
    yield node;
  }
}

export type DecodeResult<T> = { done: true } | { done: false; value: T };

/**
 * Reads concatenated documents from one text, decoding one per call
 */
export class Decoder {
  private readonly parser: JSONParser;
  private strict = false;

  constructor(input: Input, options?: ParseOptions) {
    this.parser = new JSONParser(toText(input), options);
  }

  /**
   * Fail later decode calls on object keys without a matching field
   */
  disallowUnknownFields(): this {
    this.strict = true;
    return this;
  }

  /**
   * Next document as a node, or undefined at the end of input
   */
  next(): Node | undefined {
    return this.parser.parseNext();
  }

  decode<T>(type: Type<T>, ...options: DecodeOption[]): DecodeResult<T> {
    const node = this.parser.parseNext();
    if (!node) {
      return { done: true };
    }
    const all = this.strict ? [disallowUnknownFields, ...options] : options;
    return { done: false, value: node.decodeAs(type, ...all) };
  }
}
