import { Inject, Injectable, Logger } from '@nestjs/common';
import { RANDOM_SOURCE, RandomSource, round, uniform } from '../utils/random';
import { Agent, AgentMessage, AgentReply, replyTo } from './agent-message';
import { IntentRouter } from './intent-router';

export interface SmartHomeState {
  temperature: number;
  light: 'on' | 'off';
}

export const SMART_HOME_AGENT_ID = 'smart-home';

/**
 * Simulated smart home that answers questions about, and changes, its own state.
 */
@Injectable()
export class SmartHomeAgent implements Agent {
  readonly id = SMART_HOME_AGENT_ID;
  readonly description = 'Simulated smart home: temperature and lights';
  private readonly logger = new Logger(SmartHomeAgent.name);
  private state: SmartHomeState = { temperature: 22.5, light: 'off' };

  // Order matters: the update rules must win over the plain queries
  private readonly router = new IntentRouter(
    [
      {
        name: 'update-temperature',
        pattern: /\b(update|change|set)\b.*\btemperature\b/i,
        handle: () => {
          this.state = {
            ...this.state,
            temperature: round(uniform(this.random, 20, 30), 1),
          };
          return `Simulated temperature has been updated to ${this.state.temperature}°C.`;
        },
      },
      {
        name: 'switch-light',
        pattern:
          /\b(?:turn|switch)\s+(on|off)\b.*\blights?\b|\b(?:turn|switch)\s+(?:the\s+)?lights?\s+(on|off)\b/i,
        handle: (match) => {
          const light = (match[1] ?? match[2]).toLowerCase() === 'on' ? 'on' : 'off';
          this.state = { ...this.state, light };
          return `The lights are now ${light}.`;
        },
      },
      {
        name: 'temperature',
        pattern: /\btemperature\b/i,
        handle: () =>
          `The current simulated temperature is ${this.state.temperature}°C.`,
      },
      {
        name: 'light',
        pattern: /\blights?\b/i,
        handle: () => `The lights are currently ${this.state.light}.`,
      },
      {
        name: 'status',
        pattern: /\bstatus\b|\bhome state\b/i,
        handle: () =>
          `The current smart home status is: Temperature ${this.state.temperature}°C, Lights are ${this.state.light}.`,
      },
    ],
    () =>
      "I'm sorry, I don't understand that specific query about the smart home.",
  );

  constructor(@Inject(RANDOM_SOURCE) private readonly random: RandomSource) {}

  getState(): SmartHomeState {
    return { ...this.state };
  }

  async handle(message: AgentMessage): Promise<AgentReply> {
    const { intent, text } = await this.router.route(message);
    this.logger.debug(
      `Query "${message.text}" from ${message.sender} handled as ${intent}`,
    );
    return { intent, message: replyTo(message, text) };
  }
}
