import fs from "fs"
import os from "os"
import path from "path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { encodeImageToDataUrl, hasImageExtension, isFile, listAnswerImages } from "./images"

let dir: string

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "images-"))
})

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true })
})

describe("hasImageExtension", () => {
  it("accepts the known extensions in any case", () => {
    expect(hasImageExtension("fig1.png")).toBe(true)
    expect(hasImageExtension("scan.JPEG")).toBe(true)
    expect(hasImageExtension("a/b/c.Bmp")).toBe(true)
    expect(hasImageExtension("anim.gif")).toBe(true)
  })

  it("rejects other text", () => {
    expect(hasImageExtension("What is 2+3?")).toBe(false)
    expect(hasImageExtension("notes.pdf")).toBe(false)
    expect(hasImageExtension("png")).toBe(false)
  })
})

describe("listAnswerImages", () => {
  it("returns null for a missing folder", async () => {
    expect(await listAnswerImages(path.join(dir, "nope"))).toBeNull()
  })

  it("returns null for a folder name the filesystem refuses", async () => {
    expect(await listAnswerImages(path.join(dir, "x".repeat(300)))).toBeNull()
    expect(await listAnswerImages(path.join(dir, "bad\0name"))).toBeNull()
  })

  it("keeps image files only, sorted by name", async () => {
    for (const f of ["c.png", "a.JPG", "b.bmp", "notes.txt", "z.gif"]) {
      fs.writeFileSync(path.join(dir, f), "x")
    }
    fs.mkdirSync(path.join(dir, "nested.png"))

    const set = await listAnswerImages(dir)
    expect(set).toEqual(["a.JPG", "b.bmp", "c.png", "z.gif"].map(f => path.join(dir, f)))
  })

  it("returns an empty set for a folder without images", async () => {
    fs.writeFileSync(path.join(dir, "readme.md"), "x")
    expect(await listAnswerImages(dir)).toEqual([])
  })
})

describe("encodeImageToDataUrl", () => {
  it("embeds the bytes with the mime type of the extension", async () => {
    const p = path.join(dir, "answer.jpg")
    fs.writeFileSync(p, Buffer.from("hello"))
    expect(await encodeImageToDataUrl(p)).toBe("data:image/jpeg;base64,aGVsbG8=")
  })

  it("rejects for a missing file", async () => {
    await expect(encodeImageToDataUrl(path.join(dir, "gone.png"))).rejects.toThrow()
  })
})

describe("isFile", () => {
  it("is true only for existing regular files", async () => {
    const p = path.join(dir, "q.png")
    fs.writeFileSync(p, "x")
    expect(await isFile(p)).toBe(true)
    expect(await isFile(dir)).toBe(false)
    expect(await isFile(path.join(dir, "missing.png"))).toBe(false)
  })
})
