import type { NameDigest } from "../../domain/hash/digest";

export type OutputLabels = {
  beforeLabel: string;
  afterLabel: string;
};

export function formatDigestLines(
  result: NameDigest,
  labels?: OutputLabels,
): [string, string] {
  if (!labels) return [result.name, result.digestHex];
  return [
    `${labels.beforeLabel}${result.name}`,
    `${labels.afterLabel}${result.digestHex}`,
  ];
}

export function printDigest(
  out: NodeJS.WritableStream,
  result: NameDigest,
  labels?: OutputLabels,
): void {
  for (const line of formatDigestLines(result, labels)) {
    out.write(`${line}\n`);
  }
}
