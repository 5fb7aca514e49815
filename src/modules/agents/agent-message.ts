import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export type AgentRole = 'user' | 'agent';

/**
 * The one message shape passed between agents and the HTTP edge.
 */
export interface AgentMessage {
  readonly role: AgentRole;
  readonly text: string;
  readonly sender: string;
  readonly recipient: string;
}

export interface AgentReply {
  intent: string;
  message: AgentMessage;
}

export interface Agent {
  readonly id: string;
  readonly description: string;
  handle(message: AgentMessage): Promise<AgentReply>;
}

export const HTTP_CLIENT_SENDER = 'http-client';

export class SendMessageDto {
  @IsString()
  @IsNotEmpty()
  text!: string;

  @IsOptional()
  @IsString()
  sender?: string;
}

export function replyTo(message: AgentMessage, text: string): AgentMessage {
  return {
    role: 'agent',
    text,
    sender: message.recipient,
    recipient: message.sender,
  };
}
