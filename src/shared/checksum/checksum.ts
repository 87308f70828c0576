import { createHash } from "crypto";
import { createReadStream } from "fs";
import { stat } from "fs/promises";

export type ChecksumAlgorithm = "md5" | "sha1" | "sha256";

export const computeFileChecksum = async (filePath: string, algorithm: ChecksumAlgorithm): Promise<string> => {
  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
};

export const fileSize = async (filePath: string): Promise<number> => (await stat(filePath)).size;

/** `md5:9e107d...`, the form stored on a scene. */
export const formatChecksum = (algorithm: ChecksumAlgorithm, hex: string): string => `${algorithm}:${hex.toLowerCase()}`;
