import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  Query,
  UseInterceptors,
} from '@nestjs/common';
import { CacheControlInterceptor } from '../utils/cache-control.interceptor';
import { Outcome } from '../utils/outcome';
import {
  AnalyzeWeatherDto,
  HistoricalReading,
  WeatherAnalysisResult,
  WeatherHistoryQueryDto,
  WeatherLookupResponse,
  WeatherQueryDto,
  WeatherReading,
} from './weather.dto';
import { WeatherAnalysisService } from './weather-analysis.service';
import { WeatherService } from './weather.service';

@Controller()
export class WeatherController {
  constructor(
    private readonly weatherService: WeatherService,
    private readonly weatherAnalysisService: WeatherAnalysisService,
  ) {}

  @Post('analyze')
  @HttpCode(200)
  analyze(@Body() body: AnalyzeWeatherDto): Promise<WeatherAnalysisResult> {
    return this.weatherAnalysisService.analyze(
      body.city,
      body.query,
      body.days ?? 1,
    );
  }

  @Get('weather/:city')
  @UseInterceptors(CacheControlInterceptor)
  async getWeather(
    @Param('city') city: string,
    @Query() query: WeatherQueryDto,
  ): Promise<WeatherLookupResponse<WeatherReading>> {
    const outcome = await this.weatherService.getWeather(city, query.days ?? 1);
    return toLookupResponse(city, outcome);
  }

  @Get('weather/:city/history')
  async getHistory(
    @Param('city') city: string,
    @Query() query: WeatherHistoryQueryDto,
  ): Promise<WeatherLookupResponse<HistoricalReading>> {
    const outcome = await this.weatherService.getHistorical(city, query.dt);
    return toLookupResponse(city, outcome);
  }
}

function toLookupResponse<T>(
  city: string,
  outcome: Outcome<T>,
): WeatherLookupResponse<T> {
  if (outcome.ok) {
    return { success: true, city, data: outcome.value };
  }
  return { success: false, city, data: null, error: outcome.message };
}
