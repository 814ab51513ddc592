/**
 * Recursive-descent JSON parser producing AST nodes. Accepts one trailing
 * comma before `]` and `}`.
 */

import { Decimal } from "decimal.js";

import {
  ArrayNode,
  BooleanNode,
  type Node,
  NULL,
  NumberNode,
  ObjectNode,
  StringNode,
} from "../ast/nodes";
import { TJSONParseError } from "../errors/types";
import { type ResolvedParseOptions, resolveParseOptions } from "./config";
import { JSONTokenizer } from "./tokenizer";
import type { ParseOptions, Token } from "./types";

function tokenText(token: Token): string {
  switch (token.kind) {
    case "delimiter":
      return token.char;
    case "string":
      return JSON.stringify(token.text);
    default:
      return token.text;
  }
}

function isDelimiter(token: Token, char: string): boolean {
  return token.kind === "delimiter" && token.char === char;
}

export class JSONParser {
  private readonly tokenizer: JSONTokenizer;
  private readonly options: ResolvedParseOptions;

  constructor(input: string, options: ParseOptions = {}) {
    this.options = resolveParseOptions(options);
    if (input.length > this.options.maxInputLength) {
      throw new TJSONParseError(
        "InputTooLarge",
        `Input of ${input.length} code units exceeds the limit of ${this.options.maxInputLength}`,
        this.options.startOffset
      );
    }
    this.tokenizer = new JSONTokenizer(input, {
      startOffset: this.options.startOffset,
    });
  }

  /**
   * Code-unit index of the first character not consumed yet
   */
  get position(): number {
    return this.tokenizer.position;
  }

  /**
   * Character offset of the first character not consumed yet
   */
  get offset(): number {
    return this.tokenizer.offset;
  }

  /**
   * Parse the next top-level value, or return undefined when only
   * whitespace is left
   */
  parseNext(): Node | undefined {
    const token = this.tokenizer.next();
    if (!token) {
      return;
    }
    return this.parseValue(token, 0);
  }

  /**
   * Parse one value; running out of input is an error
   */
  parse(): Node {
    const node = this.parseNext();
    if (!node) {
      throw this.endOfInput();
    }
    return node;
  }

  private endOfInput(): TJSONParseError {
    const offset = this.tokenizer.offset;
    return new TJSONParseError(
      "UnexpectedEndOfInput",
      `Unexpected end of input at position ${offset}`,
      offset
    );
  }

  private nextToken(): Token {
    const token = this.tokenizer.next();
    if (!token) {
      throw this.endOfInput();
    }
    return token;
  }

  private unexpected(token: Token): TJSONParseError {
    const text = tokenText(token);
    return new TJSONParseError(
      "UnexpectedToken",
      `Unexpected token '${text}' at position ${token.offset}`,
      token.offset,
      text
    );
  }

  private parseValue(token: Token, depth: number): Node {
    switch (token.kind) {
      case "number":
        return this.parseNumber(token.text, token.offset);
      case "string":
        return new StringNode(token.text);
      case "keyword":
        return this.parseKeyword(token.text, token.offset);
      case "delimiter":
        if (token.char === "[") {
          return this.parseArray(this.enter(depth, token.offset));
        }
        if (token.char === "{") {
          return this.parseObject(this.enter(depth, token.offset));
        }
        throw this.unexpected(token);
    }
  }

  private enter(depth: number, offset: number): number {
    const next = depth + 1;
    if (next > this.options.maxDepth) {
      throw new TJSONParseError(
        "MaxDepthExceeded",
        `Maximum nesting depth of ${this.options.maxDepth} exceeded at position ${offset}`,
        offset
      );
    }
    return next;
  }

  private parseNumber(text: string, offset: number): NumberNode {
    try {
      return new NumberNode(new Decimal(text));
    } catch (error) {
      throw new TJSONParseError(
        "InvalidNumber",
        `Invalid number '${text}' at position ${offset}`,
        offset,
        text,
        error
      );
    }
  }

  private parseKeyword(text: string, offset: number): Node {
    switch (text) {
      case "true":
        return new BooleanNode(true);
      case "false":
        return new BooleanNode(false);
      case "null":
        return NULL;
      default:
        throw new TJSONParseError(
          "UndefinedKeyword",
          `Undefined keyword '${text}' at position ${offset}`,
          offset,
          text
        );
    }
  }

  private parseArray(depth: number): ArrayNode {
    const elements: Node[] = [];
    let token = this.nextToken();
    while (!isDelimiter(token, "]")) {
      elements.push(this.parseValue(token, depth));
      token = this.nextToken();
      if (isDelimiter(token, "]")) {
        break;
      }
      if (!isDelimiter(token, ",")) {
        throw this.unexpected(token);
      }
      token = this.nextToken();
    }
    return new ArrayNode(elements);
  }

  private parseObject(depth: number): ObjectNode {
    const fields: [string, Node][] = [];
    let token = this.nextToken();
    while (!isDelimiter(token, "}")) {
      if (token.kind !== "string") {
        const text = tokenText(token);
        throw new TJSONParseError(
          "ObjectKeyExpected",
          `Object key expected at position ${token.offset}, got '${text}'`,
          token.offset,
          text
        );
      }
      const key = token.text;

      const colon = this.nextToken();
      if (!isDelimiter(colon, ":")) {
        const text = tokenText(colon);
        throw new TJSONParseError(
          "ColonExpected",
          `Colon expected at position ${colon.offset}, got '${text}'`,
          colon.offset,
          text
        );
      }

      fields.push([key, this.parseValue(this.nextToken(), depth)]);

      token = this.nextToken();
      if (isDelimiter(token, "}")) {
        break;
      }
      if (!isDelimiter(token, ",")) {
        throw this.unexpected(token);
      }
      token = this.nextToken();
    }
    return new ObjectNode(fields);
  }
}
