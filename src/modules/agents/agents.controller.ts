import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { AgentReply, SendMessageDto } from './agent-message';
import { AgentsService } from './agents.service';

@Controller('agents')
export class AgentsController {
  constructor(private readonly agentsService: AgentsService) {}

  @Get()
  list(): Array<{ id: string; description: string }> {
    return this.agentsService.list();
  }

  @Post(':agentId/messages')
  @HttpCode(200)
  send(
    @Param('agentId') agentId: string,
    @Body() body: SendMessageDto,
  ): Promise<AgentReply> {
    return this.agentsService.send(agentId, body.text, body.sender);
  }
}
