export const SUMMARY_PROMPT_VERSION = 'summary-v1';

export const SUMMARY_PROMPT = `Summarize the following research paper content into concise bullet points:
{text}
Provide clear, concise, and comprehensive bullet points covering the main ideas, methods, results, and conclusions.`;

export function buildSummaryPrompt(paperText: string): string {
  return SUMMARY_PROMPT.replace('{text}', () => paperText);
}
