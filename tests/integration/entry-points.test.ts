import { describe, expect, it } from "vitest";

import {
  ArrayNode,
  Decoder,
  NumberNode,
  parse,
  readDocuments,
  ref,
  t,
  TJSONConfigError,
  TJSONDecodeError,
  TJSONParseError,
  unmarshal,
  unmarshalInto,
  withMaxDepth,
} from "@/index";

import { catchError } from "../../src/__tests__/test-helpers";

interface Event {
  id: number;
  tags: string[];
}

const EventType = t.struct<Event>("Event", () => ({ id: 0, tags: [] }), {
  id: t.field(t.int()),
  tags: t.field(t.array(t.string())),
});

describe("unmarshal", () => {
  it("accepts UTF-8 bytes", () => {
    const bytes = new TextEncoder().encode('{"id":1,"tags":["ü"]}');
    expect(unmarshal(bytes, EventType)).toEqual({ id: 1, tags: ["ü"] });
  });

  it("rejects trailing data", () => {
    const error = catchError(() => unmarshal('{"id":1} x', EventType));
    expect(error instanceof TJSONParseError && error.code).toBe(
      "TrailingData"
    );
    expect(error instanceof TJSONParseError && error.message).toBe(
      "Unexpected data after top-level value at position 9"
    );
  });

  it("allows surrounding whitespace", () => {
    expect(unmarshal("\n 7 \t", t.int())).toBe(7);
  });
});

describe("unmarshalInto", () => {
  it("merges into the referenced value", () => {
    const slot = ref<Event>({ id: 5, tags: ["old"] });
    unmarshalInto('{"tags":["new"]}', slot, EventType);
    expect(slot.value).toEqual({ id: 5, tags: ["new"] });
  });

  it("keeps fields written before a failure", () => {
    const slot = ref<Event>({ id: 0, tags: [] });
    const error = catchError(() =>
      unmarshalInto('{"id":3,"tags":5}', slot, EventType)
    );
    expect(error instanceof TJSONDecodeError && error.code).toBe(
      "CannotConvertNumber"
    );
    expect(slot.value.id).toBe(3);
  });
});

describe("readDocuments", () => {
  it("yields each concatenated document", () => {
    const nodes = [...readDocuments('1 [2] {"a":3}\n')];
    expect(nodes.map((node) => node.type)).toEqual([
      "number",
      "array",
      "object",
    ]);
    expect(nodes[1]).toEqual(new ArrayNode([parse("2")]));
  });

  it("stops at the first malformed document", () => {
    const documents = readDocuments("1 ]");
    expect(documents.next()).toEqual({ done: false, value: NumberNode.of(1) });
    const error = catchError(() => documents.next());
    expect(error instanceof TJSONParseError && error.code).toBe(
      "UnexpectedToken"
    );
  });
});

describe("Decoder", () => {
  it("decodes one document per call", () => {
    const decoder = new Decoder('{"id":1,"tags":[]} {"id":2,"tags":["b"]}');
    expect(decoder.decode(EventType)).toEqual({
      done: false,
      value: { id: 1, tags: [] },
    });
    expect(decoder.decode(EventType)).toEqual({
      done: false,
      value: { id: 2, tags: ["b"] },
    });
    expect(decoder.decode(EventType)).toEqual({ done: true });
  });

  it("applies strict mode to later calls", () => {
    const decoder = new Decoder('{"id":1,"x":0} {"id":2,"x":0}');
    expect(decoder.decode(EventType)).toEqual({
      done: false,
      value: { id: 1, tags: [] },
    });
    decoder.disallowUnknownFields();
    const error = catchError(() => decoder.decode(EventType));
    expect(error instanceof TJSONDecodeError && error.message).toBe(
      "Undefined field 'x' in Event"
    );
  });

  it("hands out raw nodes", () => {
    const decoder = new Decoder("true");
    expect(decoder.next()?.decodeAs(t.boolean())).toBe(true);
    expect(decoder.next()).toBeUndefined();
  });
});

describe("configuration", () => {
  it("rejects invalid parse options", () => {
    const error = catchError(() => parse("1", { maxInputLength: -1 }));
    expect(error).toBeInstanceOf(TJSONConfigError);
  });

  it("rejects invalid decode depths", () => {
    const error = catchError(() => withMaxDepth(1.5));
    expect(error).toBeInstanceOf(TJSONConfigError);
    expect(error instanceof Error && error.message).toMatch(
      /^Invalid max depth: /
    );
  });
});
