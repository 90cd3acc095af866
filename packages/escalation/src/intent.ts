/**
 * @relaygate/escalation - Intent detection
 *
 * Keyword classifier for prompts that arrive without an explicit intent, and
 * the system prompt each intent is answered with.
 */

export const INTENTS = [
  'summarize',
  'explain',
  'code-gen',
  'creative',
  'translation',
  'classification',
  'status',
  'retrieval',
  'rag',
  'chat',
] as const;

export type Intent = (typeof INTENTS)[number];

// First match wins.
const KEYWORDS: ReadonlyArray<readonly [Intent, readonly string[]]> = [
  ['summarize', ['summarize', 'summarise', 'summary', 'tldr', 'sum up']],
  ['explain', ['explain', 'what is', 'what does', 'how does']],
  // Before code-gen: "classify" contains "class".
  ['classification', ['classify', 'category', 'label']],
  ['code-gen', ['code', 'function', 'class', 'implement', 'script']],
  ['creative', ['story', 'poem', 'creative', 'imagine']],
  ['translation', ['translate', 'translation', 'say in']],
  ['status', ['status', 'health', 'check']],
];

export function detectIntent(prompt: string): Intent {
  const text = prompt.toLowerCase();
  for (const [intent, keywords] of KEYWORDS) {
    if (keywords.some((kw) => text.includes(kw))) {
      return intent;
    }
  }
  return 'chat';
}

export function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}

const GROUNDING = 'Do not invent facts; if something depends on an external source, say so.';

export const SYSTEM_PROMPTS = {
  default: `You are a concise, accurate assistant. Use numbered steps for procedures. If you are unsure, say you don't know. ${GROUNDING}`,
  creative: `You are a creative, imaginative assistant. Be expressive while staying helpful. ${GROUNDING}`,
  code: `You are a precise coding assistant. Give clean, working code with a short explanation and handle errors. ${GROUNDING}`,
  rag: 'You answer strictly from the provided context. If the context does not contain the answer, say that it is not available in the provided context. Cite sources when you have them.',
  classification: 'You are a classification assistant. Give only the requested classification, without explanation. Be precise and consistent.',
} as const;

export function systemPromptFor(intent: string): string {
  switch (intent) {
    case 'code-gen':
      return SYSTEM_PROMPTS.code;
    case 'creative':
      return SYSTEM_PROMPTS.creative;
    case 'rag':
    case 'retrieval':
      return SYSTEM_PROMPTS.rag;
    case 'classification':
    case 'status':
      return SYSTEM_PROMPTS.classification;
    default:
      return SYSTEM_PROMPTS.default;
  }
}
