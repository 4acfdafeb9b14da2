import { createHash } from "node:crypto"
import type { Readable } from "node:stream"
import type { StorageData } from "../ports/storage-object"

export async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = []

  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }

  return Buffer.concat(chunks)
}

/** Copies buffers so later mutation by the caller does not reach the stored object. */
export async function toBuffer(data: StorageData): Promise<Buffer> {
  if (data instanceof Uint8Array) return Buffer.from(data)

  return readAll(data)
}

export function md5Etag(data: Buffer): string {
  return `"${createHash("md5").update(data).digest("hex")}"`
}
