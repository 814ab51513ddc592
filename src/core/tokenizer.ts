/**
 * JSON tokenizer. Reads code points one at a time with a single character of
 * pushback and produces positioned tokens lazily.
 */

import { TJSONParseError } from "../errors/types";
import type { Delimiter, Token } from "./types";
import {
  CharCodes,
  HIGH_SURROGATE_MAX,
  HIGH_SURROGATE_MIN,
  LOW_SURROGATE_MAX,
  LOW_SURROGATE_MIN,
} from "./types";

const LOWER_A = "a".charCodeAt(0);
const LOWER_Z = "z".charCodeAt(0);
const DIGIT_0 = "0".charCodeAt(0);
const DIGIT_9 = "9".charCodeAt(0);
const UPPER_A = "A".charCodeAt(0);
const UPPER_F = "F".charCodeAt(0);
const LOWER_F = "f".charCodeAt(0);
const LOWER_E = "e".charCodeAt(0);
const UPPER_E = "E".charCodeAt(0);

const SIMPLE_ESCAPES: Record<string, string> = {
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

function isWhitespace(code: number): boolean {
  return (
    code === CharCodes.SPACE ||
    code === CharCodes.TAB ||
    code === CharCodes.NEWLINE ||
    code === CharCodes.CARRIAGE_RETURN
  );
}

function isDigit(code: number): boolean {
  return code >= DIGIT_0 && code <= DIGIT_9;
}

function isNumberChar(code: number): boolean {
  return (
    isDigit(code) ||
    code === CharCodes.PLUS ||
    code === CharCodes.MINUS ||
    code === CharCodes.DOT ||
    code === LOWER_E ||
    code === UPPER_E
  );
}

function isLowerLetter(code: number): boolean {
  return code >= LOWER_A && code <= LOWER_Z;
}

function isDelimiter(ch: string): ch is Delimiter {
  return (
    ch === "{" ||
    ch === "}" ||
    ch === "[" ||
    ch === "]" ||
    ch === "," ||
    ch === ":"
  );
}

function hexValue(code: number): number {
  if (isDigit(code)) {
    return code - DIGIT_0;
  }
  if (code >= LOWER_A && code <= LOWER_F) {
    return code - LOWER_A + 10;
  }
  if (code >= UPPER_A && code <= UPPER_F) {
    return code - UPPER_A + 10;
  }
  return -1;
}

export class JSONTokenizer {
  private readonly input: string;
  private readonly baseOffset: number;
  /** Index of the next code unit to read */
  private index = 0;
  /** Number of code points consumed so far */
  private consumed = 0;
  /** Width in code units of the last code point read, for pushback */
  private lastWidth = 0;

  constructor(input: string, options: { startOffset?: number } = {}) {
    this.input = input;
    this.baseOffset = options.startOffset ?? 0;
  }

  /**
   * Code-unit index of the next unread character
   */
  get position(): number {
    return this.index;
  }

  /**
   * Character offset of the next unread character
   */
  get offset(): number {
    return this.baseOffset + this.consumed;
  }

  /**
   * Next token, or null at the end of input
   */
  next(): Token | null {
    let code = this.read();
    while (code !== undefined && isWhitespace(code)) {
      code = this.read();
    }
    if (code === undefined) {
      return null;
    }

    const offset = this.lastOffset();

    if (isDigit(code) || code === CharCodes.MINUS || code === CharCodes.DOT) {
      return { kind: "number", text: this.readRun(code, isNumberChar), offset };
    }

    if (code === CharCodes.DOUBLE_QUOTE) {
      return { kind: "string", text: this.readString(), offset };
    }

    const ch = String.fromCodePoint(code);
    if (isDelimiter(ch)) {
      return { kind: "delimiter", char: ch, offset };
    }

    if (isLowerLetter(code)) {
      return { kind: "keyword", text: this.readRun(code, isLowerLetter), offset };
    }

    throw new TJSONParseError(
      "UnexpectedCharacter",
      `Unexpected character '${ch}' at position ${offset}`,
      offset,
      ch
    );
  }

  private read(): number | undefined {
    const code = this.input.codePointAt(this.index);
    if (code === undefined) {
      return;
    }
    this.lastWidth = code > 0xff_ff ? 2 : 1;
    this.index += this.lastWidth;
    this.consumed++;
    return code;
  }

  private unread(): void {
    this.index -= this.lastWidth;
    this.consumed--;
    this.lastWidth = 0;
  }

  private lastOffset(): number {
    return this.baseOffset + this.consumed - 1;
  }

  private endOfInput(): TJSONParseError {
    return new TJSONParseError(
      "UnexpectedEndOfInput",
      `Unexpected end of input at position ${this.offset}`,
      this.offset
    );
  }

  private readRun(first: number, accept: (code: number) => boolean): string {
    const chars = [String.fromCodePoint(first)];
    for (;;) {
      const code = this.read();
      if (code === undefined) {
        break;
      }
      if (!accept(code)) {
        this.unread();
        break;
      }
      chars.push(String.fromCodePoint(code));
    }
    return chars.join("");
  }

  private readString(): string {
    const parts: string[] = [];
    for (;;) {
      const code = this.read();
      if (code === undefined) {
        throw this.endOfInput();
      }
      if (code === CharCodes.DOUBLE_QUOTE) {
        return parts.join("");
      }
      if (code !== CharCodes.BACKSLASH) {
        parts.push(String.fromCodePoint(code));
        continue;
      }

      const escaped = this.read();
      if (escaped === undefined) {
        throw this.endOfInput();
      }
      const ch = String.fromCodePoint(escaped);
      if (ch === "u") {
        parts.push(this.readUnicodeEscape());
      } else if (ch === "x") {
        parts.push(String.fromCharCode(this.readHex(2)));
      } else {
        // \" \\ \/ and unknown escapes yield the character itself
        parts.push(SIMPLE_ESCAPES[ch] ?? ch);
      }
    }
  }

  private readUnicodeEscape(): string {
    // offset of the backslash that opened the escape
    const start = this.lastOffset() - 1;
    const unit = this.readHex(4);

    if (unit >= LOW_SURROGATE_MIN && unit <= LOW_SURROGATE_MAX) {
      throw this.invalidSurrogate(unit, start);
    }
    if (unit < HIGH_SURROGATE_MIN || unit > HIGH_SURROGATE_MAX) {
      return String.fromCharCode(unit);
    }

    const backslash = this.read();
    if (backslash === undefined) {
      throw this.endOfInput();
    }
    const u = this.read();
    if (u === undefined) {
      throw this.endOfInput();
    }
    if (backslash !== CharCodes.BACKSLASH || String.fromCodePoint(u) !== "u") {
      throw this.invalidSurrogate(unit, start);
    }

    const low = this.readHex(4);
    if (low < LOW_SURROGATE_MIN || low > LOW_SURROGATE_MAX) {
      throw this.invalidSurrogate(unit, start);
    }
    return String.fromCharCode(unit, low);
  }

  private invalidSurrogate(unit: number, offset: number): TJSONParseError {
    const text = `\\u${unit.toString(16).padStart(4, "0")}`;
    return new TJSONParseError(
      "InvalidSurrogatePair",
      `Invalid surrogate pair starting with '${text}' at position ${offset}`,
      offset,
      text
    );
  }

  private readHex(digits: number): number {
    let value = 0;
    for (let i = 0; i < digits; i++) {
      const code = this.read();
      if (code === undefined) {
        throw this.endOfInput();
      }
      const digit = hexValue(code);
      if (digit < 0) {
        const ch = String.fromCodePoint(code);
        const offset = this.lastOffset();
        throw new TJSONParseError(
          "InvalidHexDigit",
          `Invalid hexadecimal digit '${ch}' at position ${offset}`,
          offset,
          ch
        );
      }
      value = value * 16 + digit;
    }
    return value;
  }
}
