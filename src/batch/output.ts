/**
 * Batch JSONL codec.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * INPUT LINE (one per request)
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   { "custom_id": "<recordId>", "method": "POST", "url": "/v1/chat/completions",
 *     "body": { model, messages: [system, user], temperature, max_tokens,
 *               response_format: { type: "json_schema", json_schema } } }
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * OUTPUT LINE (output and error files share the envelope)
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   { "id": "...", "custom_id": "<recordId>",
 *     "response": { "status_code": 200, "body": { choices: [...] } } | null,
 *     "error": { "code": "...", "message": "..." } | null }
 *
 * A choice whose finish_reason is "length" stopped at the output token cap
 * and is marked truncated. Anything else that is not a 200 with message
 * content becomes an error response for that record.
 */

import { z } from "zod";

import type { InferenceRequest } from "../requests/builder.js";
import { RESPONSE_SCHEMA_NAME } from "../requests/response-schema.js";
import type { RawResponse } from "../types/batch.js";

export const CHAT_COMPLETIONS_ENDPOINT = "/v1/chat/completions";

/** finish_reason reported when generation hit max_tokens */
export const TRUNCATED_FINISH_REASON = "length";

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export interface BatchInputLine {
  custom_id: string;
  method: "POST";
  url: typeof CHAT_COMPLETIONS_ENDPOINT;
  body: {
    model: string;
    messages: Array<{ role: "system" | "user"; content: string }>;
    temperature: number;
    max_tokens: number;
    response_format: {
      type: "json_schema";
      json_schema: {
        name: string;
        strict: true;
        schema: Readonly<Record<string, unknown>>;
      };
    };
  };
}

export function toBatchLine(request: InferenceRequest): BatchInputLine {
  return {
    custom_id: request.recordId,
    method: "POST",
    url: CHAT_COMPLETIONS_ENDPOINT,
    body: {
      model: request.model,
      messages: [
        { role: "system", content: request.systemInstruction },
        { role: "user", content: request.prompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxOutputTokens,
      response_format: {
        type: "json_schema",
        json_schema: {
          name: RESPONSE_SCHEMA_NAME,
          strict: true,
          schema: request.responseSchema,
        },
      },
    },
  };
}

/**
 * Serialize requests as a JSONL batch input file.
 */
export function encodeBatchInput(requests: readonly InferenceRequest[]): string {
  return requests.map((r) => JSON.stringify(toBatchLine(r)) + "\n").join("");
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

const ChoiceSchema = z.object({
  message: z.object({ content: z.string().nullable().optional() }),
  finish_reason: z.string().nullable().optional(),
});

const CompletionBodySchema = z.object({
  choices: z.array(ChoiceSchema).min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

const BatchOutputLineSchema = z.object({
  id: z.string().optional(),
  custom_id: z.string().min(1),
  response: z
    .object({
      status_code: z.number().int(),
      body: z.unknown(),
    })
    .nullable()
    .optional(),
  error: z
    .object({
      code: z.string().nullable().optional(),
      message: z.string(),
    })
    .nullable()
    .optional(),
});

type BatchOutputLine = z.infer<typeof BatchOutputLineSchema>;

/**
 * An output line that could not be attributed to a record.
 */
export interface BatchOutputIssue {
  /** 1-based line number */
  line: number;
  message: string;
}

export interface BatchOutputResult {
  responses: RawResponse[];
  issues: BatchOutputIssue[];
}

function toRawResponse(line: BatchOutputLine): RawResponse {
  const recordId = line.custom_id;

  if (line.error) {
    const reason = line.error.code ? `${line.error.code}: ${line.error.message}` : line.error.message;
    return { kind: "error", recordId, reason };
  }

  if (!line.response) {
    return { kind: "error", recordId, reason: "no response" };
  }

  const { status_code: statusCode, body } = line.response;
  if (statusCode !== 200) {
    const errorBody = ErrorBodySchema.safeParse(body);
    const detail = errorBody.success ? `: ${errorBody.data.error.message}` : "";
    return { kind: "error", recordId, reason: `HTTP ${statusCode}${detail}` };
  }

  const completion = CompletionBodySchema.safeParse(body);
  if (!completion.success) {
    return { kind: "error", recordId, reason: "unexpected response body" };
  }

  const [choice] = completion.data.choices;
  const content = choice?.message.content;
  if (content === undefined || content === null) {
    return { kind: "error", recordId, reason: "response has no content" };
  }

  const finishReason = choice?.finish_reason ?? null;
  return {
    kind: "body",
    recordId,
    body: content,
    finishReason,
    truncated: finishReason === TRUNCATED_FINISH_REASON,
  };
}

/**
 * Decode a batch output (or error) file.
 *
 * Blank lines are ignored. Lines that are not JSON or carry no custom_id
 * are returned as issues; every other line yields one RawResponse.
 */
export function parseBatchOutput(jsonl: string): BatchOutputResult {
  const responses: RawResponse[] = [];
  const issues: BatchOutputIssue[] = [];

  jsonl.split("\n").forEach((text, index) => {
    const line = index + 1;
    if (text.trim() === "") return;

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch {
      issues.push({ line, message: "line is not valid JSON" });
      return;
    }

    const parsed = BatchOutputLineSchema.safeParse(value);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const path = first && first.path.length > 0 ? first.path.join(".") : "(line)";
      issues.push({ line, message: `${path}: ${first?.message ?? "invalid envelope"}` });
      return;
    }

    responses.push(toRawResponse(parsed.data));
  });

  return { responses, issues };
}
