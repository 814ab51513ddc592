/**
 * Streaming reader for concatenated JSON documents. Text is buffered until a
 * complete top-level value is available; each value is emitted as one node.
 */

import { StringDecoder } from "node:string_decoder";
import { type Readable, Transform, type TransformCallback } from "node:stream";

import { Node } from "../ast/nodes";
import { TJSONParseError, TJSONStreamError } from "../errors/types";
import { logParseFailure } from "../utils/debug";
import { JSONParser } from "./parser";
import { CharCodes, type ParseOptions } from "./types";

const WHITESPACE_ONLY_REGEX = /^[ \t\r\n]*$/;

function codePointLength(text: string): number {
  return Array.from(text).length;
}

function isStreamWhitespace(code: number): boolean {
  return (
    code === CharCodes.SPACE ||
    code === CharCodes.TAB ||
    code === CharCodes.NEWLINE ||
    code === CharCodes.CARRIAGE_RETURN
  );
}

function endsScalar(code: number): boolean {
  return (
    isStreamWhitespace(code) ||
    code === CharCodes.OPEN_BRACE ||
    code === CharCodes.CLOSE_BRACE ||
    code === CharCodes.OPEN_BRACKET ||
    code === CharCodes.CLOSE_BRACKET ||
    code === CharCodes.COMMA ||
    code === CharCodes.COLON ||
    code === CharCodes.DOUBLE_QUOTE
  );
}

/**
 * Finds where the first top-level value of a growing buffer can end. The scan
 * position survives between chunks, so each character is visited once.
 */
class DocumentScanner {
  private index = 0;
  private depth = 0;
  private inString = false;
  private escaped = false;
  private inScalar = false;

  reset(): void {
    this.index = 0;
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
    this.inScalar = false;
  }

  /**
   * True once the buffer may hold a complete top-level value (or a malformed
   * one the parser should report)
   */
  scan(buffer: string): boolean {
    while (this.index < buffer.length) {
      const code = buffer.charCodeAt(this.index);
      if (this.inString) {
        this.index++;
        if (this.escaped) {
          this.escaped = false;
        } else if (code === CharCodes.BACKSLASH) {
          this.escaped = true;
        } else if (code === CharCodes.DOUBLE_QUOTE) {
          this.inString = false;
          if (this.depth === 0) {
            return true;
          }
        }
        continue;
      }
      if (this.inScalar) {
        if (endsScalar(code)) {
          this.inScalar = false;
          return true;
        }
        this.index++;
        continue;
      }
      this.index++;
      switch (code) {
        case CharCodes.DOUBLE_QUOTE:
          this.inString = true;
          break;
        case CharCodes.OPEN_BRACE:
        case CharCodes.OPEN_BRACKET:
          this.depth++;
          break;
        case CharCodes.CLOSE_BRACE:
        case CharCodes.CLOSE_BRACKET:
          this.depth--;
          if (this.depth <= 0) {
            return true;
          }
          break;
        case CharCodes.COMMA:
        case CharCodes.COLON:
          if (this.depth === 0) {
            return true;
          }
          break;
        default:
          if (this.depth === 0 && !isStreamWhitespace(code)) {
            this.inScalar = true;
          }
      }
    }
    return false;
  }
}

/**
 * Transform stream from JSON text to AST nodes
 */
export class JSONTransformStream extends Transform {
  private buffer = "";
  private offset: number;
  private readonly parseOptions: ParseOptions;
  private readonly decoder = new StringDecoder("utf8");
  private readonly scanner = new DocumentScanner();

  constructor(parseOptions: ParseOptions = {}) {
    super({ readableObjectMode: true });
    this.parseOptions = parseOptions;
    this.offset = parseOptions.startOffset ?? 0;
  }

  _transform(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    try {
      this.buffer += this.decoder.write(chunk);
      this.processBuffer(false);
      callback();
    } catch (error) {
      callback(new TJSONStreamError("Transform error", error));
    }
  }

  _flush(callback: TransformCallback): void {
    try {
      this.buffer += this.decoder.end();
      this.processBuffer(true);
      callback();
    } catch (error) {
      callback(new TJSONStreamError("Flush error", error));
    }
  }

  private processBuffer(isFlush: boolean): void {
    while (this.buffer.length > 0) {
      if (WHITESPACE_ONLY_REGEX.test(this.buffer)) {
        this.consume(this.buffer.length);
        return;
      }
      if (!isFlush && !this.scanner.scan(this.buffer)) {
        return;
      }
      const parser = new JSONParser(this.buffer, {
        ...this.parseOptions,
        startOffset: this.offset,
      });
      let node: Node | undefined;
      try {
        node = parser.parseNext();
      } catch (error) {
        if (!isFlush && this.isIncomplete(error, parser.position)) {
          return;
        }
        logParseFailure({
          phase: "stream",
          reason: "Failed to parse buffered document",
          snippet: this.buffer,
          error,
        });
        throw error;
      }
      if (!node) {
        this.consume(this.buffer.length);
        return;
      }
      // a bare scalar at the end of the buffer may continue in the next chunk
      if (
        !isFlush &&
        isScalar(node) &&
        parser.position === this.buffer.length
      ) {
        return;
      }
      this.consume(parser.position);
      this.push(node);
    }
  }

  private isIncomplete(error: unknown, position: number): boolean {
    if (!(error instanceof TJSONParseError)) {
      return false;
    }
    if (error.code === "UnexpectedEndOfInput") {
      return true;
    }
    return (
      (error.code === "UndefinedKeyword" || error.code === "InvalidNumber") &&
      position === this.buffer.length
    );
  }

  private consume(length: number): void {
    this.scanner.reset();
    this.offset += codePointLength(this.buffer.slice(0, length));
    this.buffer = this.buffer.slice(length);
  }
}

function isScalar(node: Node): boolean {
  return (
    node.type === "number" || node.type === "boolean" || node.type === "null"
  );
}

export function createJSONStream(
  parseOptions?: ParseOptions
): JSONTransformStream {
  return new JSONTransformStream(parseOptions);
}

/**
 * Parse every document of a readable stream
 */
export async function parseFromStream(
  stream: Readable,
  parseOptions?: ParseOptions
): Promise<Node[]> {
  return new Promise((resolve, reject) => {
    const results: Node[] = [];
    const transformStream = createJSONStream(parseOptions);

    const onSourceError = (err: Error) => {
      transformStream.destroy(err);
    };
    stream.on("error", onSourceError);

    transformStream.on("data", (node: Node) => {
      results.push(node);
    });

    transformStream.on("end", () => {
      stream.off("error", onSourceError);
      resolve(results);
    });

    transformStream.on("error", (error: Error) => {
      stream.off("error", onSourceError);
      reject(new TJSONStreamError("Stream parsing failed", error));
    });

    stream.pipe(transformStream);
  });
}

/**
 * Iterate over the documents of a readable stream as they complete
 */
export async function* processJSONStream(
  stream: Readable,
  parseOptions?: ParseOptions
): AsyncGenerator<Node, void, unknown> {
  const transformStream = createJSONStream(parseOptions);

  const onSourceError = (err: Error) => {
    transformStream.destroy(err);
  };
  stream.on("error", onSourceError);
  stream.pipe(transformStream);

  try {
    for await (const chunk of transformStream) {
      if (chunk instanceof Node) {
        yield chunk;
      }
    }
  } catch (error) {
    throw new TJSONStreamError("Stream processing error", error);
  } finally {
    stream.off("error", onSourceError);
  }
}
