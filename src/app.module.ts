import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { validate } from './config/environment';
import { AgentsModule } from './modules/agents/agents.module';
import { DashboardModule } from './modules/dashboard/dashboard.module';
import { GatewayModule } from './modules/gateway/gateway.module';
import { SensorsModule } from './modules/sensors/sensors.module';
import { StatusModule } from './modules/status/status.module';
import { UtilsModule } from './modules/utils/utils.module';
import { WeatherModule } from './modules/weather/weather.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    ScheduleModule.forRoot(),
    UtilsModule,
    WeatherModule,
    SensorsModule,
    GatewayModule,
    AgentsModule,
    DashboardModule,
    StatusModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
