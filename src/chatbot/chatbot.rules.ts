import { ChatIntent, INTENT_KEYWORDS, INTENT_RESPONSES, INTENT_SUGGESTIONS } from './chatbot.constants';

export interface RuleReply {
  text: string;
  intent: ChatIntent;
  suggestions: string[];
}

export function preprocessMessage(message: string): string {
  return message
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/[^\w\s가-힣]/g, '')
    .toLowerCase();
}

export function detectIntent(processed: string): ChatIntent {
  for (const [intent, keywords] of INTENT_KEYWORDS) {
    if (keywords.some((keyword) => processed.includes(keyword))) {
      return intent;
    }
  }
  return 'general';
}

export function suggestionsFor(intent: ChatIntent): string[] {
  return [...INTENT_SUGGESTIONS[intent]];
}

export function ruleReply(message: string): RuleReply {
  const intent = detectIntent(preprocessMessage(message));
  return { text: INTENT_RESPONSES[intent], intent, suggestions: suggestionsFor(intent) };
}
