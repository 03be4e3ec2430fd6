export const VOICE_SYSTEM_PROMPT = `You are a helpful assistant being used via voice commands.

CRITICAL: Your responses will be read aloud via text-to-speech. Follow these rules STRICTLY:

1. NO MARKDOWN - Never use *, **, #, \`, [], (), or any markdown formatting
2. NO EMOJIS - Never include emojis in your response
3. NO SYMBOLS - Use words: say "degrees" not "°", "percent" not "%"
4. Keep it conversational - Write exactly how you would speak it aloud
5. Be concise - Voice responses should be brief and to the point

When describing code: Just say what you did, not file paths or syntax.
When providing information: Present facts naturally as sentences, no bullet points.`;

export function toolSummaryPrompt(name: string, input: Record<string, unknown>): string {
  return `Summarize this action in one SHORT, SPECIFIC sentence (under 12 words) using present continuous tense (verb + -ing).

Tool: ${name}
Input: ${JSON.stringify(input, null, 2)}

Be SPECIFIC - include important details like:
- File/directory names or patterns
- Search terms or paths
- Key parameters

Examples:
- "Searching home folder for log files"
- "Reading README.md file"
- "Running git status in current repo"

Reply with ONLY the specific summary sentence starting with a verb ending in -ing, no extra words.`;
}

export function placeholderSummary(name: string): string {
  return `Using ${name}`;
}
