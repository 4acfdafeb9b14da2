export interface PutOptions {
  contentType?: string

  /** User metadata stored beside the object and returned by head/get/list. */
  metadata?: Record<string, string>
}

export interface ListOptions {
  prefix?: string
}
