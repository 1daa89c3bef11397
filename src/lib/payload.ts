import { RUBRIC_GUIDELINES, SCORE_CONTRACT } from "../prompts/rubric"

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } }

/** Question slot of a request, with images already encoded as data URLs */
export type EncodedQuestion =
  | { kind: "image"; dataUrl: string }
  | { kind: "text"; text: string }

const SINGLE_ANSWER_LABEL = "Answer screenshot:"
const MULTI_ANSWER_LABEL = "Student visual responses (multiple answer images follow):"

function closingInstruction(kind: EncodedQuestion["kind"], multi: boolean): string {
  let lead: string
  if (kind === "image") {
    lead = multi
      ? "Based on the problem image and all student visual responses above, assign"
      : "Assign"
  } else {
    lead = multi
      ? "Based on the question text and all student visual responses above, assign"
      : "Based on the question text and the answer screenshot, assign"
  }
  return `${lead} integer scores 0–5 for categories 1–5. ${SCORE_CONTRACT}`
}

const image = (url: string): ContentPart => ({ type: "image_url", image_url: { url } })
const text = (t: string): ContentPart => ({ type: "text", text: t })

/**
 * Content of one scoring request: rubric, question, answer label, answer
 * images, closing instruction. Wording follows the question kind and
 * whether more than one answer image is attached.
 */
export function buildScoringContent(question: EncodedQuestion, answerUrls: string[]): ContentPart[] {
  if (answerUrls.length === 0) throw new Error("At least one answer image is required")
  const multi = answerUrls.length > 1

  const parts: ContentPart[] = [text(RUBRIC_GUIDELINES)]
  if (question.kind === "image") {
    parts.push(text("Problem image:"), image(question.dataUrl))
  } else {
    parts.push(text(`Question:\n${question.text}`))
  }
  parts.push(text(multi ? MULTI_ANSWER_LABEL : SINGLE_ANSWER_LABEL))
  parts.push(...answerUrls.map(image))
  parts.push(text(closingInstruction(question.kind, multi)))
  return parts
}
