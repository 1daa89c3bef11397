import OpenAI from "openai"
import { z } from "zod"
import { extractJsonObject } from "./lib/extractJson"
import { encodeImageToDataUrl } from "./lib/images"
import { buildScoringContent, type EncodedQuestion } from "./lib/payload"
import type { ModelClient } from "./lib/modelClient"
import type { AnswerSet, EvaluationOutcome, QuestionContent, RubricScores } from "./types"

const RubricScoresSchema = z.record(z.string(), z.number())

const fail = (error: string): EvaluationOutcome => ({ scores: null, error })

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

async function encodeQuestion(question: QuestionContent): Promise<EncodedQuestion | null> {
  if (question.kind === "text") return question
  try {
    return { kind: "image", dataUrl: await encodeImageToDataUrl(question.path) }
  } catch (err: unknown) {
    console.error(`❌ [EVAL] Could not encode ${question.path}:`, errorMessage(err))
    return null
  }
}

/** Converts the raw reply into scores, or explains why it could not */
export function readScores(reply: string): EvaluationOutcome {
  const extracted = extractJsonObject(reply)
  if (extracted.value === null) return fail(`Failed to parse scores from model response: ${extracted.error}`)

  const parsed = RubricScoresSchema.safeParse(extracted.value)
  if (!parsed.success) {
    return fail(
      `Failed to parse scores from model response: expected numeric category scores, got ${JSON.stringify(extracted.value)}`,
    )
  }
  if (Object.keys(parsed.data).length === 0) {
    return fail("Failed to parse scores from model response: reply held an empty object")
  }
  return { scores: parsed.data, error: null }
}

export function totalScore(scores: RubricScores | null): number {
  if (!scores) return 0
  return Object.values(scores).reduce((sum, n) => sum + n, 0)
}

/** e.g. "Image Question, Multiple Answer Images" */
export function describeShape(question: QuestionContent, answers: AnswerSet): string {
  const q = question.kind === "image" ? "Image Question" : "Text Question"
  const a = answers.length > 1 ? "Multiple Answer Images" : "Single Answer Image"
  return `${q}, ${a}`
}

/**
 * Scores one question against its answer images.
 * Never throws: every failure comes back as `{ scores: null, error }`.
 */
export async function evaluateQuestion(
  client: ModelClient,
  question: QuestionContent,
  answers: AnswerSet,
): Promise<EvaluationOutcome> {
  if (answers.length === 0) return fail("No answer images found.")

  const encodedQuestion = await encodeQuestion(question)
  if (!encodedQuestion) return fail("Failed to encode question image.")

  const answerUrls: string[] = []
  for (const answerPath of answers) {
    try {
      answerUrls.push(await encodeImageToDataUrl(answerPath))
    } catch (err: unknown) {
      console.error(`❌ [EVAL] Could not encode ${answerPath}:`, errorMessage(err))
      return fail(`Failed to encode an answer image: ${answerPath}`)
    }
  }

  let reply: string
  try {
    reply = await client.complete(buildScoringContent(encodedQuestion, answerUrls))
  } catch (err: unknown) {
    if (err instanceof OpenAI.APIError) return fail(`OpenAI API error: ${err.message}`)
    return fail(`Unexpected error during API call: ${errorMessage(err)}`)
  }

  return readScores(reply)
}
