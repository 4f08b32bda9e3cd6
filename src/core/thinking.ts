/**
 * CORE: Reasoning Sections
 * Some local models wrap their reasoning in <think>...</think> ahead of the answer.
 */

const THINK_PATTERN = /<think>([\s\S]*?)<\/think>/g;

export function extractThinking(content: string): string[] {
    return [...content.matchAll(THINK_PATTERN)].map(match => match[1].trim());
}

/** Answer text only. Returns the content untouched when it has no sections. */
export function stripThinking(content: string): string {
    if (!content.includes('<think>')) return content;
    const stripped = content.replace(THINK_PATTERN, '').trim();
    return stripped || content;
}

/**
 * Display form: numbered reasoning blocks, a rule, then the answer.
 */
export function formatThinking(content: string): string {
    const thoughts = extractThinking(content);
    if (thoughts.length === 0) return content;

    const answer = content.replace(THINK_PATTERN, '').trim();
    const section = thoughts
        .map((text, i) => `**🤔 Thinking (${i + 1}):**\n\`\`\`\n${text}\n\`\`\`\n`)
        .join('\n');

    return answer ? `${section}\n---\n\n${answer}` : section;
}
