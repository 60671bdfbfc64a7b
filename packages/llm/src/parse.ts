// packages/llm/src/parse.ts
import { ProposalInvalidError, errorMessage } from '@shadowsql/core';

const FENCE_RE = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pulls the JSON object out of a completion. Models sometimes wrap it in a
 * markdown fence or add a sentence around it; anything else is invalid.
 */
export function parseProposalJson(text: string | null | undefined): unknown {
  const raw = (text ?? '').trim();
  if (!raw) throw new ProposalInvalidError('model returned an empty response');

  const fenced = raw.match(FENCE_RE);
  let body = fenced ? fenced[1].trim() : raw;
  if (!body.startsWith('{')) {
    const start = body.indexOf('{');
    const end = body.lastIndexOf('}');
    if (start === -1 || end <= start) throw new ProposalInvalidError('model response is not JSON', { response: raw.slice(0, 500) });
    body = body.slice(start, end + 1);
  }

  try {
    return JSON.parse(body);
  } catch (e) {
    throw new ProposalInvalidError(`model response is not valid JSON: ${errorMessage(e)}`, { response: raw.slice(0, 500) });
  }
}
