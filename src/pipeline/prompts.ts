export const ANALYST_SYSTEM_PROMPT =
  'You are an expert content analyzer. Provide thoughtful, detailed analysis of the given transcription.';

export const DEFAULT_ANALYSIS_PROMPT = `Please analyze this video transcription and provide:

1. **Summary**: A concise overview of the main topics discussed
2. **Key Points**: The most important points or arguments made
3. **Structure**: How the content is organized and flows
4. **Tone and Style**: The speaking style and tone used
5. **Notable Quotes**: Any particularly interesting or important quotes
6. **Overall Assessment**: Your thoughts on the content's value and quality

Please be thorough but concise in your analysis.`;

export const CUSTOM_ANALYSIS_PROMPT = `Please analyze this video transcription and focus on:

1. **Main Arguments**: What are the core arguments or thesis statements?
2. **Evidence Presented**: What evidence or examples are used to support claims?
3. **Logical Structure**: How well-structured and logical is the presentation?
4. **Potential Biases**: Are there any apparent biases or one-sided perspectives?
5. **Actionable Insights**: What practical takeaways can viewers implement?
6. **Questions Raised**: What questions does this content raise for further exploration?

Provide specific examples from the transcription to support your analysis.`;

export type PromptChoice = 'custom' | 'default' | 'new';

export function parsePromptChoice(answer: string): PromptChoice | null {
  const a = answer.trim().toLowerCase();
  if (a === 'c' || a === 'custom') return 'custom';
  if (a === '' || a === 'd' || a === 'default') return 'default';
  if (a === 'n' || a === 'new') return 'new';
  return null;
}

/**
 * A blank freshly entered prompt falls back to the default one.
 */
export function resolvePromptChoice(choice: PromptChoice, entered?: string): string {
  switch (choice) {
    case 'custom':
      return CUSTOM_ANALYSIS_PROMPT;
    case 'default':
      return DEFAULT_ANALYSIS_PROMPT;
    case 'new':
      return entered && entered.trim() ? entered.trim() : DEFAULT_ANALYSIS_PROMPT;
  }
}

export function buildAnalysisMessage(prompt: string, transcript: string): string {
  return `${prompt}\n\nTranscription:\n\n${transcript}`;
}
