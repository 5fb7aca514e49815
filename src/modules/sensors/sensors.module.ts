import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnalysisModule } from '../analysis/analysis.module';
import { MqttModule } from '../mqtt/mqtt.module';
import { RANDOM_SOURCE } from '../utils/random';
import { Dht11Simulator } from './dht11.simulator';
import { SensorAnalysisService } from './sensor-analysis.service';
import { SensorSimulationService } from './sensor-simulation.service';
import { SensorStoreService } from './sensor-store.service';
import { SensorStreamService } from './sensor-stream.service';
import { SensorsController } from './sensors.controller';
import { StreamController } from './stream.controller';

@Module({
  imports: [ConfigModule, AnalysisModule, MqttModule],
  controllers: [SensorsController, StreamController],
  providers: [
    Dht11Simulator,
    SensorStoreService,
    SensorSimulationService,
    SensorAnalysisService,
    SensorStreamService,
    { provide: RANDOM_SOURCE, useValue: Math.random },
  ],
  exports: [SensorStoreService, SensorAnalysisService],
})
export class SensorsModule {}
