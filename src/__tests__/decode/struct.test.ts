import { describe, expect, it, vi } from "vitest";

import {
  disallowUnknownFields,
  type Node,
  NumberNode,
  parse,
  ref,
  type StructType,
  t,
  TJSONDecodeError,
  unmarshal,
  withOnError,
} from "../..";
import { catchError } from "../test-helpers";

class Person {
  name = "";
  age = 0;
  nickname?: string;
  secret = "hidden";
  _internal = 0;
}

const PersonType = t.struct("Person", () => new Person(), {
  name: t.field(t.string()),
  age: t.field(t.int()),
  nickname: t.field(t.optional(t.string()), "nick"),
  secret: t.field(t.string(), "-"),
  _internal: t.field(t.int()),
});

describe("struct decoding", () => {
  it("fills declared fields", () => {
    const person = unmarshal(
      '{"name":"Ada","age":36,"nick":"A"}',
      PersonType
    );
    expect(person).toBeInstanceOf(Person);
    expect(person.name).toBe("Ada");
    expect(person.age).toBe(36);
    expect(person.nickname).toBe("A");
  });

  it("skips ignored and private fields", () => {
    const person = unmarshal('{"secret":"x","_internal":5}', PersonType);
    expect(person.secret).toBe("hidden");
    expect(person._internal).toBe(0);
  });

  it("uses the tag name instead of the declared name", () => {
    const person = unmarshal('{"nickname":"B"}', PersonType);
    expect(person.nickname).toBeUndefined();
  });

  it("decodes into an existing value", () => {
    const existing = new Person();
    existing.age = 5;
    const slot = ref(existing);
    parse('{"name":"x"}').decode(slot, PersonType);
    expect(slot.value).toBe(existing);
    expect(existing.age).toBe(5);
    expect(existing.name).toBe("x");
  });

  it("resets to a fresh value on null", () => {
    const slot = ref(new Person());
    slot.value.age = 9;
    parse("null").decode(slot, PersonType);
    expect(slot.value.age).toBe(0);
  });

  it("aborts on the first failing field", () => {
    const error = catchError(() =>
      unmarshal('{"name":"x","age":"old"}', PersonType)
    );
    expect(error instanceof TJSONDecodeError && error.message).toBe(
      "Cannot convert string to int"
    );
  });

  it("fails when the constructor fails", () => {
    const Broken = t.struct(
      "Broken",
      (): { a: number } => {
        throw new Error("no instances");
      },
      { a: t.field(t.int()) }
    );
    const error = catchError(() => unmarshal('{"a":1}', Broken));
    expect(error instanceof TJSONDecodeError && error.code).toBe(
      "ConstructorFailed"
    );
    expect(error instanceof TJSONDecodeError && error.message).toBe(
      "Constructor failed for Broken: no instances"
    );
  });
});

describe("unknown fields", () => {
  const Only = t.struct("Only", () => ({ a: 0 }), { a: t.field(t.int()) });

  it("are skipped by default", () => {
    expect(unmarshal('{"a":1,"b":2}', Only)).toEqual({ a: 1 });
  });

  it("fail in strict mode, naming the key", () => {
    const error = catchError(() =>
      unmarshal('{"a":1,"b":2}', Only, disallowUnknownFields)
    );
    expect(error).toBeInstanceOf(TJSONDecodeError);
    expect(error instanceof TJSONDecodeError && error.code).toBe(
      "UndefinedField"
    );
    expect(error instanceof TJSONDecodeError && error.message).toBe(
      "Undefined field 'b' in Only"
    );
  });

  it("fail in nested structs in strict mode", () => {
    interface Outer {
      inner: { a: number };
    }
    const OuterType = t.struct<Outer>("Outer", () => ({ inner: { a: 0 } }), {
      inner: t.field(Only),
    });
    const error = catchError(() =>
      unmarshal('{"inner":{"a":1,"c":3}}', OuterType, disallowUnknownFields)
    );
    expect(error instanceof TJSONDecodeError && error.message).toBe(
      "Undefined field 'c' in Only"
    );
  });
});

describe("field tag options", () => {
  interface Tagged {
    count: number;
    ids: number[];
    data: Uint8Array;
    raw: Uint8Array;
  }

  const TaggedType = t.struct<Tagged>(
    "Tagged",
    () => ({
      count: 0,
      ids: [],
      data: new Uint8Array(0),
      raw: new Uint8Array(0),
    }),
    {
      count: t.field(t.int(), "count,string"),
      ids: t.field(t.array(t.int()), "ids,[string]"),
      data: t.field(t.bytes(), "data,hex"),
      raw: t.field(t.bytes(), "raw,rot13"),
    }
  );

  it("applies string mode", () => {
    expect(unmarshal('{"count":"12"}', TaggedType).count).toBe(12);
  });

  it("applies bracketed options to elements", () => {
    expect(unmarshal('{"ids":["1","2"]}', TaggedType).ids).toEqual([1, 2]);
  });

  it("applies registered encodings", () => {
    expect(unmarshal('{"data":"616161"}', TaggedType).data).toEqual(
      new Uint8Array([0x61, 0x61, 0x61])
    );
  });

  it("ignores unregistered encodings", () => {
    expect(unmarshal('{"raw":"YWFh"}', TaggedType).raw).toEqual(
      new Uint8Array([0x61, 0x61, 0x61])
    );
  });
});

describe("embedded structs", () => {
  interface Base {
    id: number;
    x: number;
  }
  interface Other {
    x: number;
    y: number;
  }
  interface Composite {
    base: Base;
    other: Other;
  }

  const BaseType = t.struct<Base>("Base", () => ({ id: 0, x: 0 }), {
    id: t.field(t.int()),
    x: t.field(t.int()),
  });
  const OtherType = t.struct<Other>("Other", () => ({ x: 0, y: 0 }), {
    x: t.field(t.int()),
    y: t.field(t.int()),
  });
  const CompositeType = t.struct<Composite>(
    "Composite",
    () => ({ base: BaseType.zero(), other: OtherType.zero() }),
    {
      base: t.embed(BaseType),
      other: t.embed(OtherType),
    }
  );

  it("merges embedded fields into the outer struct", () => {
    const value = unmarshal('{"id":1,"y":3}', CompositeType);
    expect(value).toEqual({ base: { id: 1, x: 0 }, other: { x: 0, y: 3 } });
  });

  it("resolves equal-depth conflicts to the first declared field", () => {
    const value = unmarshal('{"x":2}', CompositeType);
    expect(value.base.x).toBe(2);
    expect(value.other.x).toBe(0);
  });

  it("prefers shallower fields regardless of declaration order", () => {
    interface Leaf {
      x: number;
    }
    interface Middle {
      leaf: Leaf;
    }
    interface Top {
      middle: Middle;
      near: Leaf;
    }
    const LeafType = t.struct<Leaf>("Leaf", () => ({ x: 0 }), {
      x: t.field(t.int()),
    });
    const MiddleType = t.struct<Middle>(
      "Middle",
      () => ({ leaf: { x: 0 } }),
      { leaf: t.embed(LeafType) }
    );
    const TopType = t.struct<Top>(
      "Top",
      () => ({ middle: { leaf: { x: 0 } }, near: { x: 0 } }),
      { middle: t.embed(MiddleType), near: t.embed(LeafType) }
    );

    const value = unmarshal('{"x":5}', TopType);
    expect(value.near.x).toBe(5);
    expect(value.middle.leaf.x).toBe(0);
  });

  it("allocates optional embedded structs on demand", () => {
    interface Meta {
      version: number;
    }
    interface Document {
      title: string;
      meta?: Meta;
    }
    const MetaType = t.struct<Meta>("Meta", () => ({ version: 0 }), {
      version: t.field(t.int()),
    });
    const DocumentType = t.struct<Document>(
      "Document",
      () => ({ title: "" }),
      {
        title: t.field(t.string()),
        meta: t.embed(t.optional(MetaType)),
      }
    );

    expect(unmarshal('{"title":"a"}', DocumentType).meta).toBeUndefined();
    expect(unmarshal('{"version":2}', DocumentType).meta).toEqual({
      version: 2,
    });
  });

  it("treats a named embedded struct as a regular field", () => {
    interface Wrapper {
      base: Base;
    }
    const WrapperType = t.struct<Wrapper>(
      "Wrapper",
      () => ({ base: BaseType.zero() }),
      { base: t.embed(BaseType, "core") }
    );
    const value = unmarshal('{"core":{"id":7},"id":8}', WrapperType);
    expect(value.base.id).toBe(7);
  });

  it("skips embedding cycles and reports them", () => {
    interface Loop {
      label: string;
      next?: Loop;
    }
    const LoopType: StructType<Loop> = t.struct<Loop>(
      "Loop",
      () => ({ label: "" }),
      () => ({
        label: t.field(t.string()),
        next: t.embed(t.optional(LoopType)),
      })
    );
    const onError = vi.fn();

    const value = unmarshal(
      '{"label":"a","next":{"label":"b"}}',
      LoopType,
      withOnError(onError)
    );

    expect(value).toEqual({ label: "a" });
    expect(onError).toHaveBeenCalledWith(
      "Embedding cycle detected at Loop.next",
      { struct: "Loop", field: "next" }
    );

    onError.mockClear();
    const loops = unmarshal(
      '[{"label":"a"},{"label":"b"},{"label":"c"}]',
      t.array(LoopType),
      withOnError(onError)
    );
    expect(loops).toEqual([{ label: "a" }, { label: "b" }, { label: "c" }]);
    expect(onError).toHaveBeenCalledTimes(1);
  });
});

describe("decode hooks", () => {
  class Celsius {
    degrees = 0;

    decodeJSON(node: Node): void {
      if (!(node instanceof NumberNode)) {
        throw new Error("temperature must be a number");
      }
      this.degrees = node.value.toNumber();
    }
  }

  class Version {
    major = 0;
    minor = 0;

    unmarshalText(text: string): void {
      const [major, minor, ...rest] = text.split(".");
      if (major === undefined || minor === undefined || rest.length > 0) {
        throw new Error(`malformed version '${text}'`);
      }
      this.major = Number.parseInt(major, 10);
      this.minor = Number.parseInt(minor, 10);
    }
  }

  const CelsiusType = t.struct("Celsius", () => new Celsius(), {});
  const VersionType = t.struct("Version", () => new Version(), {
    major: t.field(t.int()),
    minor: t.field(t.int()),
  });

  it("lets a struct decode itself", () => {
    expect(unmarshal("21.5", CelsiusType).degrees).toBe(21.5);
  });

  it("wraps hook failures", () => {
    const error = catchError(() => unmarshal('"warm"', CelsiusType));
    expect(error instanceof TJSONDecodeError && error.code).toBe(
      "DecodeHookFailed"
    );
    expect(error instanceof TJSONDecodeError && error.message).toBe(
      "decodeJSON failed for Celsius: temperature must be a number"
    );
    expect(error instanceof TJSONDecodeError && error.cause).toBeInstanceOf(
      Error
    );
  });

  it("does not call the hook for null", () => {
    const slot = ref(new Celsius());
    slot.value.degrees = 30;
    parse("null").decode(slot, CelsiusType);
    expect(slot.value.degrees).toBe(0);
  });

  it("parses text into structs that accept it", () => {
    const version = unmarshal('"1.2"', VersionType);
    expect(version).toBeInstanceOf(Version);
    expect([version.major, version.minor]).toEqual([1, 2]);
  });

  it("still decodes objects into text-parseable structs", () => {
    const version = unmarshal('{"major":3,"minor":4}', VersionType);
    expect([version.major, version.minor]).toEqual([3, 4]);
  });

  it("wraps text parsing failures", () => {
    const error = catchError(() => unmarshal('"1.2.3"', VersionType));
    expect(error instanceof TJSONDecodeError && error.code).toBe(
      "TextUnmarshalFailed"
    );
    expect(error instanceof TJSONDecodeError && error.message).toBe(
      "unmarshalText failed for Version: malformed version '1.2.3'"
    );
  });

  it("rejects text for structs without a text hook", () => {
    const error = catchError(() => unmarshal('"Ada"', PersonType));
    expect(error instanceof TJSONDecodeError && error.message).toBe(
      "Cannot convert string to Person"
    );
  });
});
