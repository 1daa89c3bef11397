import path from "path"
import { parseArgs } from "util"

export interface CliArgs {
  questionsFile: string
  answersDir: string
  outputPath: string
  help: boolean
}

export const USAGE = `Usage: visual-rubric-evaluator [options]

Scores answer images in <answers-dir>/<question id>/ against the rubric.

Options:
  --questions-file <path>  JSON array of {id, question, subject?}  (default: data.json)
  --answers-dir <path>     folder with one sub-folder per question id  (default: data)
  --output-file <path>     where the results are written  (default: evaluation.json)
  -h, --help               show this message

Relative defaults and a relative --output-file resolve against the project folder.`

/** Throws on unknown flags or missing values */
export function parseCliArgs(argv: string[], projectRoot: string): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      "questions-file": { type: "string" },
      "answers-dir": { type: "string" },
      "output-file": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
    allowPositionals: false,
  })

  const outputFile = values["output-file"] ?? "evaluation.json"
  return {
    questionsFile: path.resolve(values["questions-file"] ?? path.join(projectRoot, "data.json")),
    answersDir: path.resolve(values["answers-dir"] ?? path.join(projectRoot, "data")),
    outputPath: path.isAbsolute(outputFile) ? outputFile : path.join(projectRoot, outputFile),
    help: values.help ?? false,
  }
}
