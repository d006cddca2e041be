import { Turn } from './types';
import { formatHistory } from './history';

export const REWRITE_SYSTEM = `
You rewrite follow-up questions into fully self-contained questions about company documents.
Resolve pronouns (he/this/it/they) and references ("that report", "the same policy") from the conversation.
Output ONLY the rewritten question, nothing else.
`;

export function buildRewritePrompt(history: readonly Turn[], message: string): string {
  return `${REWRITE_SYSTEM.trim()}
----
RECENT MESSAGES:
${formatHistory(history)}
----
FOLLOW-UP FROM USER:
${message}
----
Rewrite the user message into a single explicit question that names the documents, departments,
periods and figures it refers to. If the message is already self-contained, return it unchanged.
Standalone Question:`;
}

/** Strips label echoes and wrapping quotes the model sometimes adds. */
export function cleanRewrite(output: string): string {
  let text = output.trim();
  text = text.replace(/^(standalone question|rewritten question|question)\s*:\s*/i, '');
  text = text.split('\n')[0].trim();
  if (/^["'].*["']$/.test(text)) {
    text = text.slice(1, -1).trim();
  }
  return text;
}
