// src/region/payload.ts
import { deserialize } from "bson";
import { decompress } from "fzstd";

import { readChunkDocument, type ChunkDocument } from "./chunkDocument.js";
import { toDocValue } from "./document.js";
import { CorruptPayloadError, errorMessage, type WarnFn } from "./errors.js";
import type { ChunkBlob } from "./regionFile.js";

export function decompressPayload(compressed: Uint8Array): Uint8Array {
  try {
    return decompress(compressed);
  } catch (e: unknown) {
    throw new CorruptPayloadError(`zstd decompression failed: ${errorMessage(e)}`, { cause: e });
  }
}

export function deserializeDocument(bytes: Uint8Array): unknown {
  try {
    return deserialize(bytes, { promoteBuffers: true });
  } catch (e: unknown) {
    throw new CorruptPayloadError(`BSON deserialization failed: ${errorMessage(e)}`, { cause: e });
  }
}

/** Decompress + deserialize + schema-check. Nothing partial is returned on failure. */
export function decodeChunkPayload(compressed: Uint8Array): ChunkDocument {
  const raw = deserializeDocument(decompressPayload(compressed));
  return readChunkDocument(toDocValue(raw));
}

export function decodeChunkBlob(blob: ChunkBlob, warn?: WarnFn): ChunkDocument {
  const decompressed = decompressPayload(blob.compressedBytes);
  if (warn && decompressed.length !== blob.uncompressedSize) {
    warn(
      `segment ${blob.segmentIndex}: decompressed ${decompressed.length} bytes, header says ${blob.uncompressedSize}`,
    );
  }
  return readChunkDocument(toDocValue(deserializeDocument(decompressed)));
}
