import { z } from "zod";

/** SHA3-256 output size in bytes. */
export const SHA3_256_BYTES = 32;

export const Sha3DigestHexSchema = z
  .string()
  .regex(/^[0-9a-f]{64}$/, "digest must be 64 lowercase hex characters");

export type Sha3DigestHex = z.infer<typeof Sha3DigestHexSchema>;

export const NameDigestSchema = z.object({
  name: z.string(),
  digestHex: Sha3DigestHexSchema,
});

export type NameDigest = z.infer<typeof NameDigestSchema>;
