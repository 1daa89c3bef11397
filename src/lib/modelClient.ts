import OpenAI from "openai"
import type { EvalEnv } from "../env"
import type { ContentPart } from "./payload"

/** Sends one scoring request and returns the raw reply text */
export interface ModelClient {
  complete(content: ContentPart[]): Promise<string>
}

type CompletionRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
type CreateCompletion = (
  body: CompletionRequest,
) => Promise<{ choices: Array<{ message: { content: string | null } }> }>

export class OpenAIModelClient implements ModelClient {
  private readonly create: CreateCompletion

  constructor(
    private readonly env: Pick<EvalEnv, "OPENAI_API_KEY" | "OPENAI_MODEL" | "EVAL_MAX_TOKENS">,
    create?: CreateCompletion,
  ) {
    if (create) {
      this.create = create
    } else {
      const openai = new OpenAI({ apiKey: env.OPENAI_API_KEY })
      this.create = body => openai.chat.completions.create(body)
    }
  }

  async complete(content: ContentPart[]): Promise<string> {
    const completion = await this.create({
      model: this.env.OPENAI_MODEL,
      messages: [{ role: "user", content }],
      temperature: 0,
      max_tokens: this.env.EVAL_MAX_TOKENS,
    })
    return (completion.choices[0]?.message?.content ?? "").trim()
  }
}
