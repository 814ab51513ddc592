/**
 * Scalar destination types: integers, floats, arbitrary-precision numbers,
 * timestamps, text, byte sequences and booleans
 */

import { Decimal } from "decimal.js";
import { z } from "zod";

import type {
  ArrayNode,
  BooleanNode,
  NumberNode,
  StringNode,
} from "../ast/nodes";
import { errorMessage, TJSONDecodeError } from "../errors/types";
import { base64, type Encoding } from "../registry/encoding";
import { childOptions, type DecodeOptions, resolveEncoding } from "./options";
import { conversionError, Type } from "./type";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;
const SAFE_MIN = BigInt(Number.MIN_SAFE_INTEGER);
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);
const MAX_DATE_SECONDS = 8_640_000_000_000n;
const INT64_MIN_DECIMAL = new Decimal(INT64_MIN.toString());
const UINT64_MAX_DECIMAL = new Decimal(UINT64_MAX.toString());
/** Zeros an exact integer may gain beyond its significant digits */
const MAX_EXPANDED_ZEROS = 4096;

const SIGNED_INTEGER_REGEX = /^[+-]?\d+$/;
const UNSIGNED_INTEGER_REGEX = /^\d+$/;
const DECIMAL_REGEX = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const rfc3339 = z.iso.datetime({ offset: true });

export type IntBits = 8 | 16 | 32 | 53;

function clamp(value: bigint, min: bigint, max: bigint): bigint {
  if (value < min) {
    return min;
  }
  return value > max ? max : value;
}

/**
 * Integer part of a number node, truncated toward zero and saturated to
 * [INT64_MIN, UINT64_MAX] before any digits are expanded
 */
function truncate(node: NumberNode, destination: string): bigint {
  const { value } = node;
  if (!value.isFinite()) {
    throw conversionError("CannotConvertNumber", "number", destination);
  }
  if (value.gt(UINT64_MAX_DECIMAL)) {
    return UINT64_MAX;
  }
  if (value.lt(INT64_MIN_DECIMAL)) {
    return INT64_MIN;
  }
  return BigInt(value.trunc().toFixed());
}

/**
 * Exact integer part of a number node. Exponents that would expand far past
 * the significant digits are refused.
 */
function truncateExact(node: NumberNode, destination: string): bigint {
  const { value } = node;
  if (!value.isFinite() || value.e - value.sd() + 1 > MAX_EXPANDED_ZEROS) {
    throw conversionError("CannotConvertNumber", "number", destination);
  }
  return BigInt(value.trunc().toFixed());
}

function syntaxError(text: string, destination: string): TJSONDecodeError {
  return new TJSONDecodeError(
    "InvalidSyntax",
    `Error parsing '${text}' as ${destination}`,
    { source: "string", destination }
  );
}

function rangeError(text: string, destination: string): TJSONDecodeError {
  return new TJSONDecodeError(
    "OutOfRange",
    `Value '${text}' out of range for ${destination}`,
    { source: "string", destination }
  );
}

function decodeBytes(
  encoding: Encoding,
  text: string,
  destination: string
): Uint8Array {
  try {
    return encoding.decode(text);
  } catch (error) {
    throw new TJSONDecodeError("EncodingFailed", errorMessage(error), {
      source: "string",
      destination,
      cause: error,
    });
  }
}

function parseInteger(
  node: StringNode,
  signed: boolean,
  min: bigint,
  max: bigint,
  destination: string
): bigint {
  const text = node.value;
  const syntax = signed ? SIGNED_INTEGER_REGEX : UNSIGNED_INTEGER_REGEX;
  if (!syntax.test(text)) {
    throw syntaxError(text, destination);
  }
  const value = BigInt(text);
  if (value < min || value > max) {
    throw rangeError(text, destination);
  }
  return value;
}

function intName(bits: IntBits, signed: boolean): string {
  const prefix = signed ? "int" : "uint";
  return bits === 53 ? prefix : `${prefix}${bits}`;
}

/**
 * Fixed-width integer represented as a JS number. Width 53 is the safe
 * integer range and saturates instead of wrapping.
 */
export class IntType extends Type<number> {
  readonly kind = "int";
  readonly bits: IntBits;
  readonly signed: boolean;

  constructor(bits: IntBits, signed: boolean) {
    super(intName(bits, signed));
    this.bits = bits;
    this.signed = signed;
  }

  zero(): number {
    return 0;
  }

  private get range(): [bigint, bigint] {
    if (this.bits === 53) {
      return [this.signed ? SAFE_MIN : 0n, SAFE_MAX];
    }
    const bits = BigInt(this.bits);
    return this.signed
      ? [-(2n ** (bits - 1n)), 2n ** (bits - 1n) - 1n]
      : [0n, 2n ** bits - 1n];
  }

  private narrow(value: bigint): number {
    if (this.bits === 53) {
      const [min, max] = this.range;
      return Number(clamp(value, min, max));
    }
    return this.signed
      ? Number(BigInt.asIntN(this.bits, clamp(value, INT64_MIN, INT64_MAX)))
      : Number(BigInt.asUintN(this.bits, clamp(value, 0n, UINT64_MAX)));
  }

  fromNumber(node: NumberNode): number {
    return this.narrow(truncate(node, this.name));
  }

  fromString(
    node: StringNode,
    current: number | undefined,
    options: DecodeOptions
  ): number {
    if (!options.asString) {
      return super.fromString(node, current, options);
    }
    const [min, max] = this.range;
    return Number(parseInteger(node, this.signed, min, max, this.name));
  }

  fromBoolean(node: BooleanNode): number {
    return node.value ? 1 : 0;
  }
}

/**
 * 64-bit integer represented as a bigint
 */
export class Int64Type extends Type<bigint> {
  readonly kind = "int64";
  readonly signed: boolean;

  constructor(signed: boolean) {
    super(signed ? "int64" : "uint64");
    this.signed = signed;
  }

  zero(): bigint {
    return 0n;
  }

  fromNumber(node: NumberNode): bigint {
    const value = truncate(node, this.name);
    return this.signed
      ? clamp(value, INT64_MIN, INT64_MAX)
      : clamp(value, 0n, UINT64_MAX);
  }

  fromString(
    node: StringNode,
    current: bigint | undefined,
    options: DecodeOptions
  ): bigint {
    if (!options.asString) {
      return super.fromString(node, current, options);
    }
    return this.signed
      ? parseInteger(node, true, INT64_MIN, INT64_MAX, this.name)
      : parseInteger(node, false, 0n, UINT64_MAX, this.name);
  }

  fromBoolean(node: BooleanNode): bigint {
    return node.value ? 1n : 0n;
  }
}

export class FloatType extends Type<number> {
  readonly kind = "float";
  readonly bits: 32 | 64;

  constructor(bits: 32 | 64) {
    super(`float${bits}`);
    this.bits = bits;
  }

  zero(): number {
    return 0;
  }

  fromNumber(node: NumberNode): number {
    const value = node.value.toNumber();
    return this.bits === 32 ? Math.fround(value) : value;
  }

  fromBoolean(node: BooleanNode): number {
    return node.value ? 1 : 0;
  }
}

/**
 * Arbitrary-precision integer. Parses decimal text in any mode.
 */
export class BigIntType extends Type<bigint> {
  readonly kind = "bigint";

  constructor() {
    super("bigint");
  }

  zero(): bigint {
    return 0n;
  }

  fromNumber(node: NumberNode): bigint {
    return truncateExact(node, this.name);
  }

  fromString(node: StringNode): bigint {
    if (!SIGNED_INTEGER_REGEX.test(node.value)) {
      throw syntaxError(node.value, this.name);
    }
    return BigInt(node.value);
  }
}

/**
 * Arbitrary-precision decimal. Parses decimal text in any mode.
 */
export class DecimalType extends Type<Decimal> {
  readonly kind = "decimal";

  constructor() {
    super("decimal");
  }

  zero(): Decimal {
    return new Decimal(0);
  }

  fromNumber(node: NumberNode): Decimal {
    return new Decimal(node.value);
  }

  fromString(node: StringNode): Decimal {
    if (!DECIMAL_REGEX.test(node.value)) {
      throw syntaxError(node.value, this.name);
    }
    return new Decimal(node.value);
  }
}

/**
 * Timestamp. Numbers are Unix seconds (UTC); strings are RFC 3339 text.
 */
export class TimeType extends Type<Date> {
  readonly kind = "time";

  constructor() {
    super("time");
  }

  zero(): Date {
    return new Date(0);
  }

  fromNumber(node: NumberNode): Date {
    const seconds = truncate(node, this.name);
    if (seconds < -MAX_DATE_SECONDS || seconds > MAX_DATE_SECONDS) {
      throw conversionError("CannotConvertNumber", "number", this.name);
    }
    return new Date(Number(seconds) * 1000);
  }

  fromString(node: StringNode): Date {
    if (!rfc3339.safeParse(node.value).success) {
      throw syntaxError(node.value, this.name);
    }
    return new Date(node.value);
  }
}

export class StringType extends Type<string> {
  readonly kind = "string";

  constructor() {
    super("string");
  }

  zero(): string {
    return "";
  }

  fromNumber(
    node: NumberNode,
    _current: string | undefined,
    options: DecodeOptions
  ): string {
    return options.asString ? node.value.toFixed() : node.value.toString();
  }

  fromString(
    node: StringNode,
    _current: string | undefined,
    options: DecodeOptions
  ): string {
    const encoding = resolveEncoding(options, this.name);
    if (!encoding) {
      return node.value;
    }
    const bytes = decodeBytes(encoding, node.value, this.name);
    return Buffer.from(bytes).toString("utf8");
  }

  fromBoolean(node: BooleanNode): string {
    return node.value ? "true" : "false";
  }
}

/**
 * Byte sequence. Strings are base64 unless an encoding is given or the
 * decode runs in string mode.
 */
export class BytesType extends Type<Uint8Array> {
  readonly kind = "bytes";
  private readonly element = new IntType(8, false);

  constructor() {
    super("bytes");
  }

  zero(): Uint8Array {
    return new Uint8Array(0);
  }

  fromString(
    node: StringNode,
    _current: Uint8Array | undefined,
    options: DecodeOptions
  ): Uint8Array {
    const encoding =
      resolveEncoding(options, this.name) ??
      (options.asString ? undefined : base64);
    if (!encoding) {
      return new Uint8Array(Buffer.from(node.value, "utf8"));
    }
    return decodeBytes(encoding, node.value, this.name);
  }

  fromArray(
    node: ArrayNode,
    _current: Uint8Array | undefined,
    options: DecodeOptions
  ): Uint8Array {
    const out = new Uint8Array(node.length);
    node.elements.forEach((child, i) => {
      out[i] = this.element.decodeNode(child, 0, childOptions(options));
    });
    return out;
  }
}

export class BooleanType extends Type<boolean> {
  readonly kind = "boolean";

  constructor() {
    super("boolean");
  }

  zero(): boolean {
    return false;
  }

  fromNumber(node: NumberNode): boolean {
    return !node.value.isZero();
  }

  fromString(
    node: StringNode,
    current: boolean | undefined,
    options: DecodeOptions
  ): boolean {
    if (!options.asString) {
      return super.fromString(node, current, options);
    }
    if (node.value === "true") {
      return true;
    }
    if (node.value === "false") {
      return false;
    }
    throw syntaxError(node.value, this.name);
  }

  fromBoolean(node: BooleanNode): boolean {
    return node.value;
  }
}
