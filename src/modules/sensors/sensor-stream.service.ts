import { Injectable, MessageEvent } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Observable, interval, map } from 'rxjs';
import { SensorStoreService } from './sensor-store.service';
import { SensorFrame } from './sensor.types';

@Injectable()
export class SensorStreamService {
  constructor(
    private readonly store: SensorStoreService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Unbounded stream of the latest reading, one frame per SSE_INTERVAL_MS.
   * The stream is cold: each subscriber gets its own interval and sequence,
   * and unsubscribing (client disconnect) tears the interval down.
   */
  frames(): Observable<MessageEvent> {
    const intervalMs = this.configService.get<number>('SSE_INTERVAL_MS', 1000);

    return interval(intervalMs).pipe(
      map((tick): MessageEvent => {
        const sequence = tick + 1;
        return { id: String(sequence), data: this.frame(sequence) };
      }),
    );
  }

  private frame(sequence: number): SensorFrame {
    return {
      sequence,
      reading: this.store.getCurrent(),
      sensor_status: this.store.getStatus(),
      timestamp: new Date().toISOString(),
    };
  }
}
