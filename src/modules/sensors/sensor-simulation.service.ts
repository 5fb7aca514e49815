import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { MqttService } from '../mqtt/mqtt.service';
import { Dht11Simulator } from './dht11.simulator';
import { SensorStoreService } from './sensor-store.service';
import { SensorReading } from './sensor.types';

const INTERVAL_NAME = 'sensor-simulation';

/**
 * Background producer: samples the simulated DHT11 every SENSOR_INTERVAL_MS,
 * stores the reading and publishes it over MQTT.
 */
@Injectable()
export class SensorSimulationService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SensorSimulationService.name);

  constructor(
    private readonly simulator: Dht11Simulator,
    private readonly store: SensorStoreService,
    private readonly mqttService: MqttService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService,
  ) {}

  onModuleInit(): void {
    if (!this.configService.get<boolean>('SENSOR_SIMULATION_ENABLED', true)) {
      this.logger.log('Sensor simulation disabled');
      return;
    }

    const intervalMs = this.configService.get<number>('SENSOR_INTERVAL_MS', 30000);
    const interval = setInterval(() => this.tick(), intervalMs);
    this.schedulerRegistry.addInterval(INTERVAL_NAME, interval);
    this.logger.log(`Sensor simulation started, sampling every ${intervalMs}ms`);

    this.tick();
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(INTERVAL_NAME);
    }
  }

  /**
   * Take one reading now. Used by the interval and by the manual trigger.
   */
  tick(): SensorReading | null {
    try {
      const reading = this.simulator.read();
      this.store.record(reading);

      const published = this.mqttService.publishMeasurements(
        {
          value: reading.temperature,
          timestamp: reading.timestamp,
          sensor_id: reading.sensorId,
        },
        {
          value: reading.humidity,
          timestamp: reading.timestamp,
          sensor_id: reading.sensorId,
        },
      );

      this.logger.debug(
        `Sensor reading - Temp: ${reading.temperature}°C, Humidity: ${reading.humidity}%${published ? ' (published)' : ''}`,
      );
      return reading;
    } catch (error) {
      this.store.markError();
      this.logger.error(
        `Error in sensor simulation: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
