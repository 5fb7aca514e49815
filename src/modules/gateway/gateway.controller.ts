import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { MultiAgentQueryDto, MultiAgentResponse } from './gateway.dto';
import { GatewayService } from './gateway.service';

@Controller('query')
export class GatewayController {
  constructor(private readonly gatewayService: GatewayService) {}

  @Post()
  @HttpCode(200)
  query(@Body() body: MultiAgentQueryDto): Promise<MultiAgentResponse> {
    return this.gatewayService.query({
      query: body.query,
      city: body.city,
      includeIot: body.includeIot ?? true,
      includeWeather: body.includeWeather ?? true,
    });
  }
}
