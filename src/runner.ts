import fs from "fs"
import path from "path"
import { setTimeout as sleep } from "timers/promises"
import { loadDataset, toQuestionRecord } from "./dataset"
import { describeShape, evaluateQuestion, totalScore } from "./evaluator"
import { hasImageExtension, isFile, listAnswerImages } from "./lib/images"
import type { ModelClient } from "./lib/modelClient"
import type { QuestionContent, QuestionRecord, ResultEntry } from "./types"

export type Log = Pick<Console, "log" | "error">

export interface RunOptions {
  questionsFile: string
  /** One sub-folder of answer images per question id */
  answersDir: string
  outputPath: string
  /** Question image paths in the dataset resolve against this folder */
  baseDir: string
  delayMs: number
}

export interface RunSummary {
  results: ResultEntry[]
  written: boolean
  evaluated: number
  failed: number
}

function emptyEntry(record: QuestionRecord): ResultEntry {
  return {
    question_id: record.id,
    subject: record.subject,
    question_raw: record.question,
    question_type: null,
    question_path_or_text: null,
    answer_image_paths: [],
    num_answer_images: 0,
    category_scores: null,
    total_score: 0,
    error_message: null,
  }
}

/** Image iff the text has an image extension and the file exists */
export async function classifyQuestion(
  question: string,
  baseDir: string,
): Promise<{ content: QuestionContent; missingImage: boolean }> {
  if (hasImageExtension(question)) {
    const resolved = path.resolve(baseDir, question)
    if (await isFile(resolved)) return { content: { kind: "image", path: resolved }, missingImage: false }
    return { content: { kind: "text", text: question }, missingImage: true }
  }
  return { content: { kind: "text", text: question }, missingImage: false }
}

/**
 * Builds the result entry of one question. `called` tells whether the
 * model was contacted, which is what the request delay keys off.
 */
export async function processQuestion(
  record: QuestionRecord,
  opts: Pick<RunOptions, "answersDir" | "baseDir">,
  client: ModelClient,
  log: Log = console,
): Promise<{ entry: ResultEntry; called: boolean }> {
  const entry = emptyEntry(record)

  const folder = path.join(opts.answersDir, record.id)
  const answers = await listAnswerImages(folder)
  if (answers === null) {
    log.error(`⚠️ [EVAL]   Answer folder not found: ${folder}`)
    entry.error_message = "Answer folder not found."
    return { entry, called: false }
  }
  entry.answer_image_paths = answers
  entry.num_answer_images = answers.length
  if (answers.length === 0) {
    log.error(`⚠️ [EVAL]   No answer images found in ${folder}`)
    entry.error_message = "No answer images found."
    return { entry, called: false }
  }

  const { content, missingImage } = await classifyQuestion(record.question, opts.baseDir)
  entry.question_type = content.kind === "image" ? "Image" : "Text"
  entry.question_path_or_text = content.kind === "image" ? content.path : content.text
  if (missingImage) {
    log.error(`⚠️ [EVAL]   Question image not found: ${path.resolve(opts.baseDir, record.question)}`)
    entry.error_message = "Question image file not found."
    return { entry, called: false }
  }

  log.log(`   [EVAL]   Type: ${describeShape(content, answers)}. Evaluating...`)
  const outcome = await evaluateQuestion(client, content, answers)
  if (outcome.error !== null) {
    log.error(`❌ [EVAL]   Error during evaluation: ${outcome.error}`)
    entry.error_message = outcome.error
  } else {
    entry.category_scores = outcome.scores
    entry.total_score = totalScore(outcome.scores)
    log.log(`✅ [EVAL]   Scores: ${JSON.stringify(outcome.scores)}, Total: ${entry.total_score}`)
  }
  return { entry, called: true }
}

/** Writes the results as indented JSON; non-ASCII text stays literal */
export async function writeResults(outputPath: string, results: ResultEntry[], log: Log = console): Promise<boolean> {
  try {
    await fs.promises.writeFile(outputPath, JSON.stringify(results, null, 4), "utf-8")
    return true
  } catch (err: unknown) {
    log.error(`❌ [EVAL] Error saving results to ${outputPath}:`, err instanceof Error ? err.message : err)
    return false
  }
}

/**
 * Evaluates every question of the dataset in order, one model call at a time.
 * Throws `DatasetLoadError` before any question is touched if the dataset
 * cannot be read; every later failure is recorded on its entry.
 */
export async function runEvaluation(opts: RunOptions, client: ModelClient, log: Log = console): Promise<RunSummary> {
  const items = await loadDataset(opts.questionsFile)
  const results: ResultEntry[] = []

  for (const item of items) {
    const check = toQuestionRecord(item)
    if (!check.ok) {
      log.error(`⚠️ [EVAL] Skipping item due to ${check.reason}`)
      continue
    }

    log.log(`➡️ [EVAL] Processing Question ID: ${check.record.id}...`)
    const { entry, called } = await processQuestion(check.record, opts, client, log)
    results.push(entry)
    if (called && opts.delayMs > 0) await sleep(opts.delayMs)
  }

  const written = await writeResults(opts.outputPath, results, log)
  if (written) log.log(`\n✅ [EVAL] Results saved to ${opts.outputPath}`)

  const failed = results.filter(r => r.error_message !== null).length
  log.log(`[EVAL] ${results.length - failed}/${results.length} questions scored, ${failed} with errors`)
  return { results, written, evaluated: results.length - failed, failed }
}
