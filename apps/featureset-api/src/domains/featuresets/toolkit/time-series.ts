import { readText, type StoragePort } from "@featurekit/storage"
import type { DatasetFile } from "../../projects"
import { FeaturizationError } from "../model/featurization.errors"

export interface TimeSeries {
  name: string
  label: string | null
  times: number[]
  values: number[]

  /** Measurement error per value, when the file has a third column. */
  errors: number[] | null
}

/**
 * Parses `time,value` or `time,value,error` rows. Blank lines and lines
 * starting with `#` are skipped, and the first remaining line may be a header.
 * Every row must have the same number of columns.
 */
export function parseTimeSeries(
  text: string,
  meta: { name: string; label: string | null },
): TimeSeries {
  const times: number[] = []
  const values: number[] = []
  const errors: number[] = []

  let columns: 2 | 3 | undefined
  let sawRow = false

  for (const [index, rawLine] of text.split(/\r?\n/).entries()) {
    const line = rawLine.trim()
    if (line === "" || line.startsWith("#")) continue

    const fields = line.split(",").map((field) => field.trim())
    const numbers = fields.map(toNumber)
    const isFirst = !sawRow
    sawRow = true

    if (!numbers.every(isNumber)) {
      if (isFirst) continue
      throw FeaturizationError.malformedRow(meta.name, index + 1, "expected numeric fields")
    }

    if (fields.length !== 2 && fields.length !== 3) {
      throw FeaturizationError.malformedRow(meta.name, index + 1, "expected 2 or 3 columns")
    }

    columns ??= fields.length === 3 ? 3 : 2
    if (fields.length !== columns) {
      throw FeaturizationError.malformedRow(
        meta.name,
        index + 1,
        `expected ${columns} columns, got ${fields.length}`,
      )
    }

    const [time, value, error] = numbers
    if (time === undefined || value === undefined) continue

    times.push(time)
    values.push(value)
    if (error !== undefined) errors.push(error)
  }

  return {
    name: meta.name,
    label: meta.label,
    times,
    values,
    errors: columns === 3 ? errors : null,
  }
}

export async function loadTimeSeries(
  file: DatasetFile,
  storage: StoragePort,
): Promise<TimeSeries> {
  const object = await readText(storage, file.ref)
  if (!object) throw FeaturizationError.timeSeriesNotFound(file.name)

  return parseTimeSeries(object.text, {
    name: file.name,
    label: object.metadata.label ?? null,
  })
}

export function extractLabel(series: TimeSeries): string | null {
  return series.label
}

function isNumber(value: number | null): value is number {
  return value !== null
}

function toNumber(field: string): number | null {
  if (field === "") return null

  const n = Number(field)
  return Number.isFinite(n) ? n : null
}
