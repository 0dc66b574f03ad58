const LOCALE_NAMES: Record<string, string> = {
  en: 'English',
  ko: '한국어 (Korean)',
  ja: '日本語 (Japanese)',
  zh: '中文 (Chinese)',
  ru: 'Русский (Russian)',
};

export function localeName(locale: string): string {
  return LOCALE_NAMES[locale] || LOCALE_NAMES.en;
}

export function createSystemPrompt(): string {
  return `You are an assistant that summarizes YouTube video transcripts for a chat channel.

## Rules
- Be concise. Prefer the speaker's arguments, conclusions and concrete details over filler.
- Write plain prose or "- " bullet points. No headings, no tables, no code blocks.
- Do not open with phrases like "In this video" or "The speaker discusses".
- Never invent facts that are not in the transcript.`;
}

export function createDigestSystemPrompt(): string {
  return `You combine several video summaries into one digest for a chat channel.

## Rules
- Start with 2-3 sentences on the main themes and overall conclusions.
- Then list the most interesting details as "- " bullet points.
- Always name the channel each point comes from.
- Keep it concise. Do not repeat the same point twice.`;
}

export function createUserPrompt(
  transcript: string,
  limits: { maxWords: number; minWords: number },
  locale: string
): string {
  const language = localeName(locale);

  return `Summarize the following transcript in ${limits.minWords}-${limits.maxWords} words.
Never exceed ${limits.maxWords} words.

OUTPUT LANGUAGE: Write the whole summary in **${language}**.
- If the transcript is in another language, TRANSLATE to ${language}

Transcript:
${transcript}`;
}
