/**
 * Core types for the tjson tokenizer and parser
 */

export type OnErrorFn = (
  message: string,
  metadata?: Record<string, unknown>
) => void;

export type Delimiter = "{" | "}" | "[" | "]" | "," | ":";

/**
 * Lexical token with the character offset of its first character
 */
export type Token =
  | { kind: "delimiter"; char: Delimiter; offset: number }
  | { kind: "string"; text: string; offset: number }
  | { kind: "number"; text: string; offset: number }
  | { kind: "keyword"; text: string; offset: number };

/**
 * Options for JSON parsing
 */
export type ParseOptions = {
  /** Maximum nesting depth of arrays and objects (default: 512) */
  maxDepth?: number;
  /** Maximum input length in UTF-16 code units (default: 16 MiB) */
  maxInputLength?: number;
  /** Offset added to every reported position (for streaming) */
  startOffset?: number;
};

/**
 * Character code constants for the tokenizer
 */
export const CharCodes = {
  OPEN_BRACE: "{".charCodeAt(0),
  CLOSE_BRACE: "}".charCodeAt(0),
  OPEN_BRACKET: "[".charCodeAt(0),
  CLOSE_BRACKET: "]".charCodeAt(0),
  COMMA: ",".charCodeAt(0),
  COLON: ":".charCodeAt(0),
  DOUBLE_QUOTE: '"'.charCodeAt(0),
  BACKSLASH: "\\".charCodeAt(0),
  MINUS: "-".charCodeAt(0),
  PLUS: "+".charCodeAt(0),
  DOT: ".".charCodeAt(0),
  SPACE: " ".charCodeAt(0),
  TAB: "\t".charCodeAt(0),
  NEWLINE: "\n".charCodeAt(0),
  CARRIAGE_RETURN: "\r".charCodeAt(0),
} as const;

export const HIGH_SURROGATE_MIN = 0xd8_00;
export const HIGH_SURROGATE_MAX = 0xdb_ff;
export const LOW_SURROGATE_MIN = 0xdc_00;
export const LOW_SURROGATE_MAX = 0xdf_ff;
