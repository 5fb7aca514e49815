import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnalysisModule } from '../analysis/analysis.module';
import { MqttModule } from '../mqtt/mqtt.module';
import { UtilsModule } from '../utils/utils.module';
import { HealthController } from './health.controller';
import { StatusController } from './status.controller';
import { StatusService } from './status.service';

@Module({
  imports: [ConfigModule, UtilsModule, AnalysisModule, MqttModule],
  controllers: [StatusController, HealthController],
  providers: [StatusService],
})
export class StatusModule {}
