export function normalizeText(s: string): string {
    return s
      .replace(/\r\n/g, "\n")
      .replace(/\t/g, "  ")
      .replace(/[ \u00A0]+/g, " ")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }

/** Drops control characters (newline and tab survive) and collapses whitespace. */
export function sanitizeMessage(text: string): string {
    let kept = '';
    for (const ch of text) {
        const code = ch.charCodeAt(0);
        if (code >= 32 || ch === '\n' || ch === '\t') {
            kept += ch;
        }
    }
    return kept.split(/\s+/).filter(Boolean).join(' ');
}

export function formatConversationTitle(firstMessage: string, maxLength = 50): string {
    let title = firstMessage.trim();
    if (title.length > maxLength) {
        title = title.slice(0, maxLength - 3) + '...';
    }
    return title ? title[0].toUpperCase() + title.slice(1) : title;
}

export function clip(t: string, maxChars: number): string {
    return t.length <= maxChars ? t : t.slice(0, maxChars);
}

// ~4 characters per token for English text; no tokenizer needed.
export function estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
}
