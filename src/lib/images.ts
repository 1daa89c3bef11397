import fs from "fs"
import path from "path"
import type { AnswerSet } from "../types"

const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".gif", ".bmp"] as const

const MIME_BY_EXT: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
}

export function hasImageExtension(file: string): boolean {
  const ext = path.extname(file).toLowerCase()
  return IMAGE_EXTENSIONS.some(e => e === ext)
}

export async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(p)).isFile()
  } catch {
    return false
  }
}

/**
 * Lists the answer images of one question folder, sorted by name.
 * Returns null when the folder cannot be read: missing, not a folder,
 * unreadable, or a name the filesystem refuses.
 */
export async function listAnswerImages(folder: string): Promise<AnswerSet | null> {
  let entries: fs.Dirent[]
  try {
    entries = await fs.promises.readdir(folder, { withFileTypes: true })
  } catch {
    return null
  }
  return entries
    .filter(e => !e.isDirectory() && hasImageExtension(e.name))
    .map(e => path.join(folder, e.name))
    .sort()
}

/** Reads an image into a self-contained `data:` URL */
export async function encodeImageToDataUrl(imagePath: string): Promise<string> {
  const bytes = await fs.promises.readFile(imagePath)
  const mime = MIME_BY_EXT[path.extname(imagePath).toLowerCase()] ?? "image/png"
  return `data:${mime};base64,${bytes.toString("base64")}`
}
