import { createHash } from "node:crypto";
import type { NameDigest } from "../../domain/hash/digest";

export function encodeUtf8(input: string): Buffer {
  return Buffer.from(input, "utf8");
}

export function sha3_256Hex(bytes: Uint8Array): string {
  return createHash("sha3-256").update(bytes).digest("hex");
}

/**
 * Computes the SHA3-256 (FIPS 202) hex digest of the UTF-8 bytes of `input`.
 *
 * The empty string hashes to
 * `a7ffc6f8bf1ed76651c14756a061d662f580ff4de43b49fa82d80a4b80f8434a`.
 */
export function sha3_256HexUtf8(input: string): string {
  return sha3_256Hex(encodeUtf8(input));
}

export function hashName(name: string): NameDigest {
  return { name, digestHex: sha3_256HexUtf8(name) };
}
