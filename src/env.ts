import "dotenv/config"

type EnvSource = Record<string, string | undefined>

export interface EvalEnv {
  OPENAI_API_KEY: string
  OPENAI_MODEL: string
  EVAL_MAX_TOKENS: number
  /** Fixed pause between model calls */
  EVAL_DELAY_MS: number
}

function required(source: EnvSource, name: string): string {
  const v = source[name]?.trim()
  if (!v) throw new Error(`Missing env: ${name}`)
  return v
}

function count(source: EnvSource, name: string, fallback: number): number {
  const raw = source[name]?.trim()
  if (!raw) return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid env: ${name} must be a non-negative integer (got "${raw}")`)
  return n
}

export function readEnv(source: EnvSource = process.env): EvalEnv {
  return {
    OPENAI_API_KEY: required(source, "OPENAI_API_KEY"),
    OPENAI_MODEL: source.OPENAI_MODEL?.trim() || "gpt-4.1",
    EVAL_MAX_TOKENS: count(source, "EVAL_MAX_TOKENS", 250),
    EVAL_DELAY_MS: count(source, "EVAL_DELAY_MS", 1000),
  }
}
