import { TJSONRegistryError } from "../errors/types";
import { base64, type Encoding, hex } from "./encoding";

/**
 * Named byte encoding schemes, consulted when a string node has to produce
 * a byte sequence
 */
export class EncodingRegistry {
  private readonly encodings = new Map<string, Encoding>();

  register(name: string, encoding: Encoding): void {
    if (
      typeof encoding?.encode !== "function" ||
      typeof encoding.decode !== "function"
    ) {
      throw new TJSONRegistryError(`Invalid encoding scheme: ${name}`);
    }
    if (this.encodings.has(name)) {
      throw new TJSONRegistryError(`Duplicate encoding: ${name}`);
    }
    this.encodings.set(name, encoding);
  }

  lookup(name: string): Encoding | undefined {
    return this.encodings.get(name);
  }

  has(name: string): boolean {
    return this.encodings.has(name);
  }
}

export function createEncodingRegistry(): EncodingRegistry {
  const registry = new EncodingRegistry();
  registry.register("base64", base64);
  registry.register("hex", hex);
  return registry;
}

export const defaultEncodingRegistry = createEncodingRegistry();

export function registerEncoding(name: string, encoding: Encoding): void {
  defaultEncodingRegistry.register(name, encoding);
}
