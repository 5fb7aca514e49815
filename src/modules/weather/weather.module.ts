import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnalysisModule } from '../analysis/analysis.module';
import { GeocodingModule } from '../geocoding/geocoding.module';
import { RANDOM_SOURCE } from '../utils/random';
import { UtilsModule } from '../utils/utils.module';
import { OpenWeatherClient } from './openweather.client';
import { WeatherAnalysisService } from './weather-analysis.service';
import { WeatherController } from './weather.controller';
import { WeatherService } from './weather.service';
import { WeatherSimulator } from './weather-simulator';

@Module({
  imports: [ConfigModule, UtilsModule, GeocodingModule, AnalysisModule],
  controllers: [WeatherController],
  providers: [
    OpenWeatherClient,
    WeatherSimulator,
    WeatherService,
    WeatherAnalysisService,
    { provide: RANDOM_SOURCE, useValue: Math.random },
  ],
  exports: [WeatherService, WeatherAnalysisService],
})
export class WeatherModule {}
