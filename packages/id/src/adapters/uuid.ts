import { v4 } from "uuid"
import type { IdGenerator } from "../ports/id-generator"

export const uuidV4: IdGenerator<string> = { generate: () => v4() }
