import fs from "fs"
import { z } from "zod"
import type { QuestionRecord } from "./types"

export class DatasetLoadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "DatasetLoadError"
  }
}

const QuestionRecordSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).refine(id => id.length > 0),
  question: z.string().min(1),
  subject: z.unknown().transform(s => (typeof s === "string" ? s : "N/A")),
})

export type RecordCheck =
  | { ok: true; record: QuestionRecord }
  | { ok: false; reason: string }

/** Reads the dataset file; any failure here aborts the whole run */
export async function loadDataset(file: string): Promise<unknown[]> {
  let raw: string
  try {
    raw = await fs.promises.readFile(file, "utf-8")
  } catch {
    throw new DatasetLoadError(`Questions file not found at ${file}`)
  }

  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    throw new DatasetLoadError(`Could not decode JSON from ${file}`)
  }

  if (!Array.isArray(data)) {
    throw new DatasetLoadError(`Expected a JSON array of questions in ${file}`)
  }
  return data
}

export function toQuestionRecord(item: unknown): RecordCheck {
  const parsed = QuestionRecordSchema.safeParse(item)
  if (!parsed.success) {
    return { ok: false, reason: `missing 'id' or 'question': ${JSON.stringify(item)}` }
  }
  return { ok: true, record: parsed.data }
}
