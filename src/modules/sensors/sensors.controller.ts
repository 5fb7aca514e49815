import {
  Body,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Post,
  Query,
} from '@nestjs/common';
import { MqttService } from '../mqtt/mqtt.service';
import { HUMIDITY_TOPIC, TEMPERATURE_TOPIC } from '../mqtt/mqtt.constants';
import { SensorAnalysisService } from './sensor-analysis.service';
import { SensorSimulationService } from './sensor-simulation.service';
import { SensorStoreService } from './sensor-store.service';
import {
  AnalyzeSensorsDto,
  IotAnalysisResult,
  IotSnapshot,
  SensorHistoryQueryDto,
  SensorReading,
  SensorStatus,
  SensorStatusReport,
} from './sensor.types';

@Controller('iot')
export class SensorsController {
  constructor(
    private readonly store: SensorStoreService,
    private readonly simulation: SensorSimulationService,
    private readonly sensorAnalysisService: SensorAnalysisService,
    private readonly mqttService: MqttService,
  ) {}

  @Get('data')
  getData(): { success: boolean; data: IotSnapshot | null } {
    const snapshot = this.sensorAnalysisService.getSnapshot();
    return { success: snapshot !== null, data: snapshot };
  }

  @Get('current')
  getCurrent(): {
    status: 'success';
    data: SensorReading;
    sensor_status: SensorStatus;
  } {
    const reading = this.store.getCurrent();
    if (!reading) {
      throw new NotFoundException('No sensor data available');
    }
    return {
      status: 'success',
      data: reading,
      sensor_status: this.store.getStatus(),
    };
  }

  @Get('history')
  getHistory(@Query() query: SensorHistoryQueryDto): {
    status: 'success';
    total_readings: number;
    returned_readings: number;
    data: SensorReading[];
  } {
    const history = this.store.getHistory(query.limit ?? 50);
    return {
      status: 'success',
      total_readings: this.store.count(),
      returned_readings: history.length,
      data: history,
    };
  }

  @Get('status')
  getStatus(): SensorStatusReport {
    return {
      sensor_status: this.store.getStatus(),
      last_update: this.store.getLastUpdate()?.toISOString() ?? null,
      total_readings: this.store.count(),
      mqtt_connected: this.mqttService.isConnected(),
      mqtt_broker: this.mqttService.brokerUrl,
      topics: {
        temperature: TEMPERATURE_TOPIC,
        humidity: HUMIDITY_TOPIC,
      },
    };
  }

  @Post('analyze')
  @HttpCode(200)
  analyze(@Body() body: AnalyzeSensorsDto): Promise<IotAnalysisResult> {
    return this.sensorAnalysisService.analyze(body.query, body.city);
  }

  @Post('simulate-reading')
  @HttpCode(200)
  simulateReading(): { status: 'success' | 'error'; reading: SensorReading | null } {
    const reading = this.simulation.tick();
    return { status: reading ? 'success' : 'error', reading };
  }
}
