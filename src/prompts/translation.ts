/**
 * Translation prompts
 * One instruction/input pair is sent per gettext message
 */

export interface PromptPair {
  instructions: string;
  input: string;
}

export const prompts = {
  system: (targetLanguage: string): string =>
    `You are a professional translator for gettext messages. You will translate the message to ${targetLanguage}. You must preserve placeholder, written in the format \`%{placeholder}\`.`,

  message: (text: string, targetLanguage: string): string =>
    `Translate this gettext message to ${targetLanguage}, preserving placeholders like \`%{...}\`.

Important:
- If it's already in ${targetLanguage}, just return the original text.
- Just return the translation, do not add any other text or comments.

Text to translate:
"${text}"`,

  translate: (text: string, targetLanguage: string): PromptPair => ({
    instructions: prompts.system(targetLanguage),
    input: prompts.message(text, targetLanguage),
  }),
};
