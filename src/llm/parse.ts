import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError } from '../shared/errors.js';
import type { ChatClient } from './client.js';
import { buildEventExtractionMessages, buildRepairPrompt, EVENT_EXTRACTION_SYSTEM_PROMPT } from './prompts.js';

export const LlmEventSchema = z.object({
  date_time: z.string().default(''),
  title: z.string().default(''),
  place: z.string().default(''),
  url: z.string().default(''),
});

export type LlmEvent = z.infer<typeof LlmEventSchema>;

/**
 * Strip markdown code fences from LLM output.
 */
function stripCodeFences(raw: string): string {
  return raw
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```\s*$/, '')
    .trim();
}

/**
 * Try to parse and validate JSON from LLM output.
 * Returns the parsed data, or a string error message if it fails.
 */
function tryParse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T | string {
  try {
    const json: unknown = JSON.parse(raw);
    const result = schema.safeParse(json);
    if (result.success) return result.data;
    return result.error.message;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/**
 * Parse LLM JSON output with one repair-retry on parse or validation failure.
 */
export async function parseWithRetry<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rawOutput: string,
  client: ChatClient,
  systemMessage: string,
): Promise<T> {
  const cleaned = stripCodeFences(rawOutput);

  const firstResult = tryParse(schema, cleaned);
  if (typeof firstResult !== 'string') return firstResult;

  logger.debug({ error: firstResult, raw: cleaned.slice(0, 200) }, 'LLM output invalid, attempting repair');

  let repairContent: string;
  try {
    const repairResponse = await client.chat([
      { role: 'system', content: systemMessage },
      { role: 'user', content: buildRepairPrompt(firstResult, cleaned) },
    ]);
    repairContent = repairResponse.content;
  } catch (err) {
    throw new LlmError(`LLM repair call failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  const repairedCleaned = stripCodeFences(repairContent);
  const repairedResult = tryParse(schema, repairedCleaned);
  if (typeof repairedResult !== 'string') return repairedResult;

  throw new LlmError('LLM output invalid after repair attempt', {
    original_error: firstResult,
    repair_error: repairedResult,
    raw: repairedCleaned.slice(0, 500),
  });
}

/**
 * Ask the model for title, date text, place and link of one listing fragment.
 */
export async function parseEventFragment(
  client: ChatClient,
  html: string,
  excerptChars: number,
): Promise<LlmEvent> {
  const response = await client.chat(buildEventExtractionMessages(html, excerptChars));
  return parseWithRetry(LlmEventSchema, response.content, client, EVENT_EXTRACTION_SYSTEM_PROMPT);
}
