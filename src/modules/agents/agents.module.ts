import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { RANDOM_SOURCE } from '../utils/random';
import { WeatherModule } from '../weather/weather.module';
import { AgentsController } from './agents.controller';
import { AgentsService } from './agents.service';
import { ChatController } from './chat.controller';
import { SmartHomeAgent } from './smart-home.agent';
import { TimeService } from './time.service';
import { WeatherAgent } from './weather.agent';

@Module({
  imports: [AnalysisModule, WeatherModule],
  controllers: [AgentsController, ChatController],
  providers: [
    AgentsService,
    SmartHomeAgent,
    WeatherAgent,
    TimeService,
    { provide: RANDOM_SOURCE, useValue: Math.random },
  ],
})
export class AgentsModule {}
