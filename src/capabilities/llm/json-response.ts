/**
 * Model output helpers
 */

import { ErrorCode } from '../../errors/error-codes';
import { ContractViolationError } from '../../errors/gate-error';

const WRAPPING_FENCE = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/;
const JSON_FENCE = /```(?:json)?\s*([\s\S]*?)\s*```/;

/**
 * Unwrap a response that is one fenced block; other text is returned trimmed
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(WRAPPING_FENCE);
  return match ? match[1].trim() : trimmed;
}

/**
 * Parse the JSON value in a model response. Accepts a fenced block or bare
 * JSON surrounded by prose.
 *
 * @throws ContractViolationError (E303) when no JSON value can be parsed
 */
export function parseJsonResponse(text: string, capability: string): unknown {
  // Extract JSON from response (handle markdown code blocks)
  const fenced = text.match(JSON_FENCE);
  let jsonStr = (fenced ? fenced[1] : text).trim();

  if (!jsonStr.startsWith('{') && !jsonStr.startsWith('[')) {
    const objectMatch = jsonStr.match(/[[{][\s\S]*[\]}]/);
    if (!objectMatch) {
      throw new ContractViolationError(
        ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT,
        capability,
        'no JSON found in model response'
      );
    }
    jsonStr = objectMatch[0];
  }

  try {
    return JSON.parse(jsonStr);
  } catch (error) {
    throw new ContractViolationError(
      ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT,
      capability,
      `invalid JSON in model response (${error instanceof Error ? error.message : String(error)})`
    );
  }
}

