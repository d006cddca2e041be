import { AccessScope, ROLE_DESCRIPTIONS } from '../access-scope/types';
import { RankedChunk } from '../retrieval/types';
import { Turn } from '../chat-memory/types';
import { formatHistory } from '../chat-memory/history';

export const DECLINE_SENTENCE = "I don't have that information in the available documents";
export const FINAL_ANSWER_MARKER = 'Final Answer:';

export const PREAMBLE = `You are an AI assistant that helps employees find information in company documents.

CRITICAL RULES - FOLLOW STRICTLY:
1. ONLY use information explicitly stated in the CONTEXT below.
2. DO NOT make up, invent, or assume ANY information.
3. Think step by step: decide which sources are relevant, then reason only from them.
4. Cite the source backing each claim as [Source n].
5. If the context doesn't answer the question, say "${DECLINE_SENTENCE}".`;

export function sourceBlock(chunk: RankedChunk, position: number): string {
  return `[Source ${position}] ${chunk.metadata.documentName} (${chunk.collection})\n${chunk.text.trim()}`;
}

export function noContextBlock(scope: AccessScope): string {
  return `No document in the accessible collections (${scope.collections.join(', ')}) matched this question.
Tell the user you couldn't find relevant information, that it may belong to another department's documents,
and suggest rephrasing the question or contacting the appropriate department. Do not answer from general knowledge.`;
}

export function renderPrompt(question: string, chunks: readonly RankedChunk[], history: readonly Turn[], scope: AccessScope): string {
  const context = chunks.length > 0
    ? chunks.map((chunk, i) => sourceBlock(chunk, i + 1)).join('\n\n')
    : noContextBlock(scope);
  const conversation = history.length > 0 ? formatHistory(history) : 'No previous conversation';

  return `${PREAMBLE}

CONTEXT FROM DOCUMENTS:
${context}

USER ROLE: ${scope.role} (${ROLE_DESCRIPTIONS[scope.role]})
ACCESSIBLE DEPARTMENTS: ${scope.collections.join(', ')}

CONVERSATION HISTORY:
${conversation}

USER QUESTION: ${question}

RESPONSE FORMAT:
Reasoning: <step-by-step reasoning over the numbered sources>
${FINAL_ANSWER_MARKER} <a concise answer citing [Source n] for each claim, or "${DECLINE_SENTENCE}">`;
}
