import { describe, expect, it } from "vitest";

import {
  base64,
  createEncodingRegistry,
  type Encoding,
  EncodingRegistry,
  hex,
  t,
  TJSONDecodeError,
  TJSONEncodingError,
  TJSONRegistryError,
  TypeRegistry,
  unmarshal,
  withEncodings,
  withTypes,
} from "../..";
import { catchError } from "../test-helpers";

const reversed: Encoding = {
  encode(bytes) {
    return Buffer.from(bytes).reverse().toString("latin1");
  },
  decode(text) {
    return Uint8Array.from(Buffer.from(text, "latin1")).reverse();
  },
};

describe("EncodingRegistry", () => {
  it("ships base64 and hex", () => {
    const registry = createEncodingRegistry();
    expect(registry.lookup("base64")).toBe(base64);
    expect(registry.lookup("hex")).toBe(hex);
    expect(registry.has("rev")).toBe(false);
  });

  it("starts empty when constructed directly", () => {
    expect(new EncodingRegistry().has("base64")).toBe(false);
  });

  it("rejects duplicate names", () => {
    const registry = createEncodingRegistry();
    const error = catchError(() => registry.register("hex", reversed));
    expect(error).toBeInstanceOf(TJSONRegistryError);
    expect(error instanceof Error && error.message).toBe(
      "Duplicate encoding: hex"
    );
  });

  it("rejects values that are not encoding schemes", () => {
    const registry = new EncodingRegistry();
    const error = catchError(() =>
      Reflect.apply(registry.register, registry, ["bad", { encode: 1 }])
    );
    expect(error).toBeInstanceOf(TJSONRegistryError);
    expect(error instanceof Error && error.message).toBe(
      "Invalid encoding scheme: bad"
    );
  });

  it("resolves tag encodings against the active registry", () => {
    interface Payload {
      data: Uint8Array;
    }
    const PayloadType = t.struct<Payload>(
      "Payload",
      () => ({ data: new Uint8Array(0) }),
      { data: t.field(t.bytes(), "data,rev") }
    );
    const registry = createEncodingRegistry();
    registry.register("rev", reversed);

    expect(
      unmarshal('{"data":"abc"}', PayloadType, withEncodings(registry)).data
    ).toEqual(new Uint8Array([0x63, 0x62, 0x61]));
  });
});

describe("built-in encodings", () => {
  it("encodes", () => {
    const bytes = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);
    expect(base64.encode(bytes)).toBe("3q2+7w==");
    expect(hex.encode(bytes)).toBe("deadbeef");
  });

  it("ignores line breaks in base64", () => {
    expect(base64.decode("YW\r\nFh")).toEqual(
      new Uint8Array([0x61, 0x61, 0x61])
    );
  });

  it("requires base64 padding", () => {
    const error = catchError(() => base64.decode("YWE"));
    expect(error).toBeInstanceOf(TJSONEncodingError);
    expect(error instanceof Error && error.message).toBe(
      "base64: illegal data in 'YWE'"
    );
  });

  it("rejects invalid hex digits", () => {
    const error = catchError(() => hex.decode("zz"));
    expect(error instanceof Error && error.message).toBe(
      "hex: invalid byte in 'zz'"
    );
  });
});

describe("TypeRegistry", () => {
  const Named = t.interface(
    "Named",
    (value: unknown): value is { name: string } =>
      typeof value === "object" && value !== null && "name" in value
  );

  it("rejects duplicate registrations", () => {
    const registry = new TypeRegistry();
    registry.register(Named, () => ({ name: "a" }));
    expect(registry.has(Named)).toBe(true);
    const error = catchError(() =>
      registry.register(Named, () => ({ name: "b" }))
    );
    expect(error).toBeInstanceOf(TJSONRegistryError);
    expect(error instanceof Error && error.message).toBe(
      "Duplicate user type: Named"
    );
  });

  it("rejects concrete destination types", () => {
    const registry = new TypeRegistry();
    const error = catchError(() =>
      Reflect.apply(registry.register, registry, [t.int(), () => 1])
    );
    expect(error instanceof Error && error.message).toBe(
      "User type must be an interface type: int"
    );
  });

  it("rejects constructors that are not functions", () => {
    const registry = new TypeRegistry();
    const error = catchError(() =>
      Reflect.apply(registry.register, registry, [Named, 5])
    );
    expect(error instanceof Error && error.message).toBe(
      "Constructor function expected for Named: number"
    );
  });

  it("keeps registries independent", () => {
    const first = new TypeRegistry();
    first.register(Named, () => ({ name: "first" }));
    expect(unmarshal("{}", Named, withTypes(first))).toEqual({
      name: "first",
    });

    const error = catchError(() => unmarshal("1", Named));
    expect(error instanceof TJSONDecodeError && error.code).toBe(
      "IncompatibleTypes"
    );
  });
});
