import { createReadStream } from "node:fs"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { md5Etag, toBuffer } from "../core/bytes"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/storage-object"
import type { ListOptions, PutOptions } from "../ports/storage-options"

export interface FsStorageOptions {
  rootDir: string
}

type Sidecar = {
  etag: string
  contentType?: string
  metadata?: Record<string, string>
}

const SIDECAR_SUFFIX = ".meta.json"

/**
 * Buckets are directories under `rootDir`. Content type, user metadata and
 * etag live in a `<file>.meta.json` sidecar.
 */
export class FileSystemStorage implements StoragePort {
  private readonly rootDir: string

  constructor(options: FsStorageOptions) {
    this.rootDir = path.resolve(options.rootDir)
  }

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const filePath = this.resolveFilePath(ref)
    const buffer = await toBuffer(data)

    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, buffer)

    const sidecar: Sidecar = {
      etag: md5Etag(buffer),
      ...(options?.contentType && { contentType: options.contentType }),
      ...(options?.metadata && { metadata: { ...options.metadata } }),
    }

    await fs.writeFile(`${filePath}${SIDECAR_SUFFIX}`, JSON.stringify(sidecar, null, 2))
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const filePath = this.resolveFilePath(ref)

    try {
      return await this.describe(ref.key, filePath)
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return (await this.head(ref)) !== null
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const filePath = this.resolveFilePath(ref)
    const meta = await this.head(ref)
    if (!meta) return null

    return { ...meta, body: createReadStream(filePath) }
  }

  async delete(ref: ObjectRef): Promise<void> {
    const filePath = this.resolveFilePath(ref)

    await fs.rm(filePath, { force: true })
    await fs.rm(`${filePath}${SIDECAR_SUFFIX}`, { force: true })
  }

  async list(bucket: StorageBucket, options?: ListOptions): Promise<StorageObjectMetadata[]> {
    const bucketDir = path.join(this.rootDir, bucket)
    const prefix = options?.prefix ?? ""

    let keys: string[]
    try {
      keys = await walk(bucketDir)
    } catch (err) {
      if (isNotFound(err)) return []
      throw err
    }

    const out: StorageObjectMetadata[] = []

    for (const key of keys.filter((k) => k.startsWith(prefix)).sort()) {
      const meta = await this.head({ bucket, key })
      if (meta) out.push(meta)
    }

    return out
  }

  private async describe(key: string, filePath: string): Promise<StorageObjectMetadata> {
    const stat = await fs.stat(filePath)
    const sidecar = await this.loadSidecar(filePath)

    return {
      key,
      sizeInBytes: stat.size,
      lastModified: stat.mtime,
      etag: sidecar?.etag ?? md5Etag(await fs.readFile(filePath)),
      ...(sidecar?.contentType && { contentType: sidecar.contentType }),
      ...(sidecar?.metadata && { metadata: sidecar.metadata }),
    }
  }

  private async loadSidecar(filePath: string): Promise<Sidecar | null> {
    let raw: string
    try {
      raw = await fs.readFile(`${filePath}${SIDECAR_SUFFIX}`, "utf-8")
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }

    return parseSidecar(JSON.parse(raw))
  }

  private resolveFilePath(ref: ObjectRef): string {
    validateKey(ref.key)

    const bucketDir = path.resolve(this.rootDir, ref.bucket)
    const filePath = path.resolve(bucketDir, ...ref.key.split("/"))

    if (!filePath.startsWith(bucketDir + path.sep)) {
      throw new Error("Resolved storage path escapes bucket directory")
    }

    return filePath
  }
}

function validateKey(key: string): void {
  if (key.startsWith("/")) {
    throw new Error("Storage key must not start with '/'")
  }
  if (key.includes("\\")) {
    throw new Error("Storage key must not contain backslashes")
  }
  if (key.endsWith(SIDECAR_SUFFIX)) {
    throw new Error(`Storage key must not end with '${SIDECAR_SUFFIX}'`)
  }

  const segments = key.split("/")
  if (segments.some((s) => !s)) {
    throw new Error("Storage key must not be empty or contain empty segments")
  }
  if (segments.some((s) => s === "." || s === "..")) {
    throw new Error("Storage key must not contain '.' or '..' segments")
  }
}

function parseSidecar(value: unknown): Sidecar | null {
  if (typeof value !== "object" || value === null) return null
  if (!("etag" in value) || typeof value.etag !== "string") return null

  const sidecar: Sidecar = { etag: value.etag }

  if ("contentType" in value && typeof value.contentType === "string") {
    sidecar.contentType = value.contentType
  }

  if ("metadata" in value && typeof value.metadata === "object" && value.metadata !== null) {
    sidecar.metadata = Object.fromEntries(
      Object.entries(value.metadata).filter(
        (entry): entry is [string, string] => typeof entry[1] === "string",
      ),
    )
  }

  return sidecar
}

async function walk(dir: string, prefix = ""): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  const files: string[] = []

  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name

    if (entry.isDirectory()) {
      files.push(...(await walk(path.join(dir, entry.name), relative)))
    } else if (!entry.name.endsWith(SIDECAR_SUFFIX)) {
      files.push(relative)
    }
  }

  return files
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
