import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnalysisModule } from '../analysis/analysis.module';
import { SensorsModule } from '../sensors/sensors.module';
import { WeatherModule } from '../weather/weather.module';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';

@Module({
  imports: [ConfigModule, AnalysisModule, SensorsModule, WeatherModule],
  controllers: [DashboardController],
  providers: [DashboardService],
})
export class DashboardModule {}
