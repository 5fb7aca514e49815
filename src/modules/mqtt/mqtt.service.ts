import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IClientOptions, MqttClient } from 'mqtt';
import {
  COMMAND_TOPICS,
  HUMIDITY_TOPIC,
  MQTT_CONNECT,
  TEMPERATURE_TOPIC,
} from './mqtt.constants';

export type MqttConnect = (url: string, options: IClientOptions) => MqttClient;

export interface MeasurementMessage {
  value: number;
  timestamp: string;
  sensor_id: string;
}

/**
 * Optional bridge to an MQTT broker. Without MQTT_URL it stays disabled;
 * broker errors are logged and never reach the publishers.
 */
@Injectable()
export class MqttService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MqttService.name);
  private client: MqttClient | null = null;

  constructor(
    private readonly configService: ConfigService,
    @Inject(MQTT_CONNECT) private readonly connect: MqttConnect,
  ) {}

  get brokerUrl(): string | null {
    return this.configService.get<string>('MQTT_URL') ?? null;
  }

  onModuleInit(): void {
    const url = this.brokerUrl;
    if (!url) {
      this.logger.log('MQTT_URL not set, sensor readings will not be published');
      return;
    }

    const client = this.connect(url, {
      clientId: this.configService.get<string>('MQTT_CLIENT_ID', 'iot_agent'),
      keepalive: 60,
      reconnectPeriod: 5000,
    });

    client.on('connect', () => {
      this.logger.log(`Connected to MQTT broker: ${url}`);
      client.subscribe(COMMAND_TOPICS, (error) => {
        if (error) {
          this.logger.error(`Failed to subscribe to command topics: ${error.message}`);
        }
      });
    });

    client.on('message', (topic, payload) => {
      this.logger.log(
        `Received MQTT message - Topic: ${topic}, Payload: ${payload.toString()}`,
      );
    });

    client.on('error', (error) => {
      this.logger.error(`MQTT client error: ${error.message}`);
    });

    this.client = client;
  }

  async onModuleDestroy(): Promise<void> {
    if (this.client) {
      await this.client.endAsync();
      this.client = null;
    }
  }

  isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  /**
   * Publish one temperature/humidity pair. Returns whether it was handed
   * to a connected client.
   */
  publishMeasurements(
    temperature: MeasurementMessage,
    humidity: MeasurementMessage,
  ): boolean {
    const client = this.client;
    if (!client || !client.connected) {
      return false;
    }

    this.publish(client, TEMPERATURE_TOPIC, temperature);
    this.publish(client, HUMIDITY_TOPIC, humidity);
    return true;
  }

  private publish(
    client: MqttClient,
    topic: string,
    message: MeasurementMessage,
  ): void {
    client.publish(topic, JSON.stringify(message), (error) => {
      if (error) {
        this.logger.error(`Error publishing to ${topic}: ${error.message}`);
      }
    });
  }
}
