import fs from "fs"
import os from "os"
import path from "path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { DatasetLoadError, loadDataset, toQuestionRecord } from "./dataset"

let dir: string

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "dataset-"))
})

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true })
})

describe("loadDataset", () => {
  it("returns the items of a JSON array", async () => {
    const f = path.join(dir, "data.json")
    fs.writeFileSync(f, JSON.stringify([{ id: "q1", question: "What is 7×8?" }]))
    expect(await loadDataset(f)).toEqual([{ id: "q1", question: "What is 7×8?" }])
  })

  it("fails for a missing file", async () => {
    const f = path.join(dir, "missing.json")
    await expect(loadDataset(f)).rejects.toThrow(new DatasetLoadError(`Questions file not found at ${f}`))
  })

  it("fails for invalid JSON", async () => {
    const f = path.join(dir, "bad.json")
    fs.writeFileSync(f, "[{ id: q1 }")
    await expect(loadDataset(f)).rejects.toThrow(`Could not decode JSON from ${f}`)
  })

  it("fails when the top level is not an array", async () => {
    const f = path.join(dir, "obj.json")
    fs.writeFileSync(f, '{"id":"q1"}')
    await expect(loadDataset(f)).rejects.toBeInstanceOf(DatasetLoadError)
  })
})

describe("toQuestionRecord", () => {
  it("defaults the subject", () => {
    expect(toQuestionRecord({ id: "q1", question: "What is 2+3?" })).toEqual({
      ok: true,
      record: { id: "q1", question: "What is 2+3?", subject: "N/A" },
    })
  })

  it("turns numeric ids into strings", () => {
    expect(toQuestionRecord({ id: 7, question: "fig.png", subject: "Geometry" })).toEqual({
      ok: true,
      record: { id: "7", question: "fig.png", subject: "Geometry" },
    })
  })

  it("keeps records whose subject is null or not a string", () => {
    expect(toQuestionRecord({ id: "ok", question: "B", subject: null })).toEqual({
      ok: true,
      record: { id: "ok", question: "B", subject: "N/A" },
    })
    expect(toQuestionRecord({ id: "ok", question: "B", subject: 12 })).toEqual({
      ok: true,
      record: { id: "ok", question: "B", subject: "N/A" },
    })
  })

  it("rejects records without id or question", () => {
    expect(toQuestionRecord({ question: "x" })).toEqual({ ok: false, reason: `missing 'id' or 'question': {"question":"x"}` })
    expect(toQuestionRecord({ id: "q1", question: "" }).ok).toBe(false)
    expect(toQuestionRecord({ id: "", question: "x" }).ok).toBe(false)
    expect(toQuestionRecord(null).ok).toBe(false)
  })
})
