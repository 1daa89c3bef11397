#!/usr/bin/env node
import path from "path"
import { USAGE, parseCliArgs, type CliArgs } from "./args"
import { DatasetLoadError } from "./dataset"
import { readEnv } from "./env"
import { OpenAIModelClient } from "./lib/modelClient"
import { runEvaluation } from "./runner"

// src/ and dist/ both sit one level below the project folder
const PROJECT_ROOT = path.resolve(__dirname, "..")

async function main() {
  let args: CliArgs
  try {
    args = parseCliArgs(process.argv.slice(2), PROJECT_ROOT)
  } catch (e: unknown) {
    console.error(`❌ ${e instanceof Error ? e.message : String(e)}\n\n${USAGE}`)
    process.exitCode = 2
    return
  }
  if (args.help) {
    console.log(USAGE)
    return
  }

  const env = readEnv()
  console.log("✅ Loaded ENV:")
  console.log("  OPENAI_MODEL:", env.OPENAI_MODEL)
  console.log("  EVAL_MAX_TOKENS:", env.EVAL_MAX_TOKENS)
  console.log("  EVAL_DELAY_MS:", env.EVAL_DELAY_MS)

  try {
    await runEvaluation(
      {
        questionsFile: args.questionsFile,
        answersDir: args.answersDir,
        outputPath: args.outputPath,
        baseDir: PROJECT_ROOT,
        delayMs: env.EVAL_DELAY_MS,
      },
      new OpenAIModelClient(env),
    )
  } catch (e: unknown) {
    if (e instanceof DatasetLoadError) {
      console.error(`❌ Error: ${e.message}`)
      process.exitCode = 1
      return
    }
    throw e
  }
}

main().catch((e: unknown) => {
  console.error("❌ [EVAL] Fatal:", e instanceof Error ? e.message : e)
  process.exitCode = 1
})
