import { AgentMessage } from './agent-message';

export interface IntentRule {
  readonly name: string;
  readonly pattern: RegExp;
  handle(match: RegExpMatchArray, message: AgentMessage): string | Promise<string>;
}

export interface RoutedIntent {
  intent: string;
  text: string;
}

export const FALLBACK_INTENT = 'fallback';

/**
 * Evaluates rules in declaration order; the first pattern that matches the
 * message text handles it. Nothing matching falls through to `fallback`.
 */
export class IntentRouter {
  constructor(
    private readonly rules: readonly IntentRule[],
    private readonly fallback: (message: AgentMessage) => string,
  ) {}

  async route(message: AgentMessage): Promise<RoutedIntent> {
    for (const rule of this.rules) {
      const match = message.text.match(rule.pattern);
      if (match) {
        return { intent: rule.name, text: await rule.handle(match, message) };
      }
    }
    return { intent: FALLBACK_INTENT, text: this.fallback(message) };
  }

  get intents(): string[] {
    return this.rules.map((rule) => rule.name);
  }
}
