import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { ChecksumAlgorithm } from "../schemas/index-config.js";

/** Streams the file at `path` through `algorithm` and returns the hex digest. */
export async function hashFile(
  path: string,
  algorithm: ChecksumAlgorithm = "sha1",
): Promise<string> {
  if (path === "") {
    throw new Error("hashFile requires a path");
  }

  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(path);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("error", reject);
    stream.on("end", () => {
      resolve(hash.digest("hex"));
    });
  });
}
