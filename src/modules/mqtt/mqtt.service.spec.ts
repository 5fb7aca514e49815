import { ConfigService } from '@nestjs/config';
import { EventEmitter } from 'events';
import { MqttService } from './mqtt.service';

class FakeClient extends EventEmitter {
  connected = false;
  subscribe = jest.fn();
  publish = jest.fn();
  endAsync = jest.fn().mockResolvedValue(undefined);
}

const MEASUREMENT = {
  value: 24.5,
  timestamp: '2026-01-15T12:00:00.000Z',
  sensor_id: 'DHT11_001',
};

describe('MqttService', () => {
  let client: FakeClient;
  let connect: jest.Mock;

  beforeEach(() => {
    client = new FakeClient();
    connect = jest.fn().mockReturnValue(client);
  });

  it('stays disabled without a broker url', () => {
    const service = new MqttService(new ConfigService({}), connect);

    service.onModuleInit();

    expect(connect).not.toHaveBeenCalled();
    expect(service.isConnected()).toBe(false);
    expect(service.publishMeasurements(MEASUREMENT, MEASUREMENT)).toBe(false);
  });

  it('connects and subscribes to the command topics', () => {
    const service = new MqttService(
      new ConfigService({ MQTT_URL: 'mqtt://broker.test:1883', MQTT_CLIENT_ID: 'test-agent' }),
      connect,
    );

    service.onModuleInit();
    client.connected = true;
    client.emit('connect');

    expect(connect).toHaveBeenCalledWith('mqtt://broker.test:1883', {
      clientId: 'test-agent',
      keepalive: 60,
      reconnectPeriod: 5000,
    });
    expect(client.subscribe).toHaveBeenCalledWith(
      ['sensor/temperature/command', 'sensor/humidity/command'],
      expect.any(Function),
    );
    expect(service.isConnected()).toBe(true);
  });

  it('publishes JSON payloads only while connected', () => {
    const service = new MqttService(
      new ConfigService({ MQTT_URL: 'mqtt://broker.test:1883' }),
      connect,
    );
    service.onModuleInit();

    expect(service.publishMeasurements(MEASUREMENT, MEASUREMENT)).toBe(false);

    client.connected = true;
    expect(
      service.publishMeasurements(MEASUREMENT, { ...MEASUREMENT, value: 61 }),
    ).toBe(true);
    expect(client.publish).toHaveBeenNthCalledWith(
      1,
      'sensor/temperature',
      '{"value":24.5,"timestamp":"2026-01-15T12:00:00.000Z","sensor_id":"DHT11_001"}',
      expect.any(Function),
    );
    expect(client.publish).toHaveBeenNthCalledWith(
      2,
      'sensor/humidity',
      '{"value":61,"timestamp":"2026-01-15T12:00:00.000Z","sensor_id":"DHT11_001"}',
      expect.any(Function),
    );
  });

  it('survives broker errors and closes the client on shutdown', async () => {
    const service = new MqttService(
      new ConfigService({ MQTT_URL: 'mqtt://broker.test:1883' }),
      connect,
    );
    service.onModuleInit();

    expect(() => client.emit('error', new Error('connection refused'))).not.toThrow();

    await service.onModuleDestroy();
    expect(client.endAsync).toHaveBeenCalledTimes(1);
    expect(service.isConnected()).toBe(false);
  });
});
