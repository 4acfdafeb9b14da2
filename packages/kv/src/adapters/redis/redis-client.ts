export type RedisEvalOptions = {
  keys: string[]
  arguments: (string | Buffer)[]
}

/**
 * The subset of a `redis` v5 client, mapped to return blob strings as
 * `Buffer`, that the adapters use.
 */
export type RedisBytesClient = {
  isOpen: boolean
  connect(): Promise<unknown>
  quit(): Promise<unknown>

  get(key: string): Promise<Buffer | null>
  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>
  exists(keys: string | readonly string[]): Promise<number>
  del(keys: string | readonly string[]): Promise<number>
  incr(key: string): Promise<number>
  eval(script: string, options: RedisEvalOptions): Promise<unknown>

  multi(): {
    eval(script: string, options: RedisEvalOptions): unknown
    exec(): Promise<unknown>
  }
}
