export function buildAugmentationPrompt(query: string, count: number): string {
    return `Generate ${count} alternative ways to ask this question.
Each should be a natural, slightly different phrasing of the same intent, using different vocabulary where possible.
These will be used to search company documents for better retrieval.

Original question: "${query}"

Output exactly ${count} questions, one per line.
Do NOT include numbers, bullets, or explanations - just the questions.`;
}

const LIST_MARKER = /^(?:\d+[.)]|[-•*])\s*/;

export function parseVariants(output: string): string[] {
    return output
        .split('\n')
        .map(line => line.trim().replace(LIST_MARKER, '').trim())
        .map(line => (/^["'].*["']$/.test(line) ? line.slice(1, -1).trim() : line))
        .filter(line => line.length > 0);
}
