import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { connect } from 'mqtt';
import { MQTT_CONNECT } from './mqtt.constants';
import { MqttService } from './mqtt.service';

@Module({
  imports: [ConfigModule],
  providers: [MqttService, { provide: MQTT_CONNECT, useValue: connect }],
  exports: [MqttService],
})
export class MqttModule {}
