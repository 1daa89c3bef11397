export interface QuestionRecord {
  id: string
  /** Question text, or a path to the question image relative to the base directory */
  question: string
  subject: string
}

/** Absolute answer image paths, sorted by file name */
export type AnswerSet = string[]

/** Category key ("1".."5") to score */
export type RubricScores = Record<string, number>

export type QuestionType = "Image" | "Text"

export interface ResultEntry {
  question_id: string
  subject: string
  question_raw: string
  question_type: QuestionType | null
  question_path_or_text: string | null
  answer_image_paths: AnswerSet
  num_answer_images: number
  category_scores: RubricScores | null
  total_score: number
  error_message: string | null
}

export type QuestionContent =
  | { kind: "image"; path: string }
  | { kind: "text"; text: string }

export type EvaluationOutcome =
  | { scores: RubricScores; error: null }
  | { scores: null; error: string }
