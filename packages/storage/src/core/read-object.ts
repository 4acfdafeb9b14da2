import type { StoragePort } from "../ports/storage"
import type { ObjectRef } from "../ports/storage-object"
import { readAll } from "./bytes"

export type TextObject = {
  text: string
  metadata: Record<string, string>
}

/**
 * Reads a whole object as UTF-8. Returns null when the object does not exist.
 */
export async function readText(
  storage: StoragePort,
  ref: ObjectRef,
): Promise<TextObject | null> {
  const obj = await storage.get(ref)
  if (!obj) return null

  const body = await readAll(obj.body)

  return { text: body.toString("utf-8"), metadata: obj.metadata ?? {} }
}
