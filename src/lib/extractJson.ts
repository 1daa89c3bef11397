export type JsonObject = Record<string, unknown>

export type ExtractResult =
  | { value: JsonObject; error: null }
  | { value: null; error: string }

function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

/**
 * Pulls the JSON object out of free-form model text.
 *
 * The span runs from the first `{` to the last `}`; braces are not balanced,
 * so two separate objects in one reply fail to parse as one.
 */
export function extractJsonObject(raw: string): ExtractResult {
  const start = raw.indexOf("{")
  const end = raw.lastIndexOf("}")
  if (start === -1 || end === -1 || end <= start) {
    return { value: null, error: `Could not find valid JSON in response: ${raw}` }
  }

  const span = raw.slice(start, end + 1)
  let parsed: unknown
  try {
    parsed = JSON.parse(span)
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err)
    return { value: null, error: `Error decoding JSON from response: ${raw}. Error: ${reason}` }
  }

  if (!isJsonObject(parsed)) {
    return { value: null, error: `Response JSON is not an object: ${span}` }
  }
  return { value: parsed, error: null }
}
