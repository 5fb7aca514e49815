import { MessageEvent } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { take } from 'rxjs';
import { SensorStoreService } from './sensor-store.service';
import { SensorStreamService } from './sensor-stream.service';

describe('SensorStreamService', () => {
  let service: SensorStreamService;
  let store: SensorStoreService;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-15T12:00:00Z'));
    store = new SensorStoreService(new ConfigService({}));
    service = new SensorStreamService(
      store,
      new ConfigService({ SSE_INTERVAL_MS: 1000 }),
    );
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('emits one numbered frame per interval', () => {
    store.record({
      temperature: 23.1,
      humidity: 58,
      timestamp: '2026-01-15T11:59:30.000Z',
      sensorId: 'DHT11_001',
    });
    const events: MessageEvent[] = [];
    const subscription = service.frames().subscribe((event) => events.push(event));

    jest.advanceTimersByTime(2000);
    subscription.unsubscribe();

    expect(events).toHaveLength(2);
    expect(events[0]).toEqual({
      id: '1',
      data: {
        sequence: 1,
        reading: {
          temperature: 23.1,
          humidity: 58,
          timestamp: '2026-01-15T11:59:30.000Z',
          sensorId: 'DHT11_001',
        },
        sensor_status: 'online',
        timestamp: '2026-01-15T12:00:01.000Z',
      },
    });
    expect(events[1].id).toBe('2');
  });

  it('stops producing frames once the subscriber leaves', () => {
    const events: MessageEvent[] = [];
    const subscription = service.frames().subscribe((event) => events.push(event));

    jest.advanceTimersByTime(1000);
    subscription.unsubscribe();
    jest.advanceTimersByTime(10_000);

    expect(events).toHaveLength(1);
    expect(jest.getTimerCount()).toBe(0);
  });

  it('gives each subscriber its own sequence', () => {
    const first: MessageEvent[] = [];
    const second: MessageEvent[] = [];
    const a = service.frames().subscribe((event) => first.push(event));
    jest.advanceTimersByTime(1000);
    const b = service.frames().subscribe((event) => second.push(event));
    jest.advanceTimersByTime(1000);
    a.unsubscribe();
    b.unsubscribe();

    expect(first.map((event) => event.id)).toEqual(['1', '2']);
    expect(second.map((event) => event.id)).toEqual(['1']);
  });

  it('completes and releases its timer when limited by an operator', () => {
    const ids: string[] = [];
    let completed = false;
    service
      .frames()
      .pipe(take(3))
      .subscribe({
        next: (event) => ids.push(String(event.id)),
        complete: () => {
          completed = true;
        },
      });

    jest.advanceTimersByTime(5000);

    expect(ids).toEqual(['1', '2', '3']);
    expect(completed).toBe(true);
    expect(jest.getTimerCount()).toBe(0);
  });
});
