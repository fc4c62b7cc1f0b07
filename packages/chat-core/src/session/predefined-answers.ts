import table from './predefined-answers.json';

export interface PredefinedAnswer {
  keywords: readonly string[];
  answer: string;
}

export const DEFAULT_PREDEFINED_ANSWERS: readonly PredefinedAnswer[] = table.answers;

export function findPredefinedAnswer(
  text: string,
  answers: readonly PredefinedAnswer[] = DEFAULT_PREDEFINED_ANSWERS,
): string | null {
  const lower = text.toLowerCase();
  for (const entry of answers) {
    if (entry.keywords.some((keyword) => lower.includes(keyword.toLowerCase()))) {
      return entry.answer;
    }
  }
  return null;
}
