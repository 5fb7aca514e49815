import { Injectable, NotFoundException } from '@nestjs/common';
import {
  Agent,
  AgentMessage,
  AgentReply,
  HTTP_CLIENT_SENDER,
} from './agent-message';
import { SmartHomeAgent } from './smart-home.agent';
import { WeatherAgent } from './weather.agent';

@Injectable()
export class AgentsService {
  private readonly agents: Map<string, Agent>;

  constructor(smartHomeAgent: SmartHomeAgent, weatherAgent: WeatherAgent) {
    this.agents = new Map<string, Agent>(
      [smartHomeAgent, weatherAgent].map((agent) => [agent.id, agent]),
    );
  }

  list(): Array<{ id: string; description: string }> {
    return [...this.agents.values()].map(({ id, description }) => ({
      id,
      description,
    }));
  }

  /**
   * Adapt an inbound HTTP request into an {@link AgentMessage} for `agentId`.
   */
  async send(
    agentId: string,
    text: string,
    sender: string = HTTP_CLIENT_SENDER,
  ): Promise<AgentReply> {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new NotFoundException(`Agent not found: ${agentId}`);
    }

    const message: AgentMessage = {
      role: 'user',
      text,
      sender,
      recipient: agent.id,
    };
    return agent.handle(message);
  }
}
