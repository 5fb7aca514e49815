import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnalysisModule } from '../analysis/analysis.module';
import { SensorsModule } from '../sensors/sensors.module';
import { WeatherModule } from '../weather/weather.module';
import { GatewayController } from './gateway.controller';
import { GatewayService } from './gateway.service';

@Module({
  imports: [ConfigModule, AnalysisModule, SensorsModule, WeatherModule],
  controllers: [GatewayController],
  providers: [GatewayService],
})
export class GatewayModule {}
