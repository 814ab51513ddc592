import type { Node } from "../ast/nodes";
import type { InterfaceType } from "../decode/dynamic";
import type { DecodeContext } from "../decode/options";
import { TJSONRegistryError } from "../errors/types";

/**
 * Builds a concrete value of an abstract type from a node. Nested decode
 * calls should pass the context on with `withContext(context)`.
 */
export type TypeConstructor<T> = (node: Node, context: DecodeContext) => T;

function isInterfaceDescriptor(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "interface"
  );
}

function describe(value: unknown): string {
  if (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string"
  ) {
    return value.name;
  }
  return String(value);
}

/**
 * Constructors for abstract (interface) destination types.
 *
 * Registration is meant to happen once at startup; a duplicate is a
 * programming error and throws.
 */
export class TypeRegistry {
  private readonly constructors = new Map<
    InterfaceType<unknown>,
    TypeConstructor<unknown>
  >();

  register<T>(type: InterfaceType<T>, constructor: TypeConstructor<T>): void {
    const target: unknown = type;
    if (!isInterfaceDescriptor(target)) {
      throw new TJSONRegistryError(
        `User type must be an interface type: ${describe(target)}`
      );
    }
    if (typeof constructor !== "function") {
      throw new TJSONRegistryError(
        `Constructor function expected for ${type.name}: ${typeof constructor}`
      );
    }
    if (this.constructors.has(type)) {
      throw new TJSONRegistryError(`Duplicate user type: ${type.name}`);
    }
    this.constructors.set(type, constructor);
  }

  lookup(type: InterfaceType<unknown>): TypeConstructor<unknown> | undefined {
    return this.constructors.get(type);
  }

  has(type: InterfaceType<unknown>): boolean {
    return this.constructors.has(type);
  }
}

export const defaultTypeRegistry = new TypeRegistry();

export function registerType<T>(
  type: InterfaceType<T>,
  constructor: TypeConstructor<T>
): void {
  defaultTypeRegistry.register(type, constructor);
}
