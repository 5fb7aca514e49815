import { Controller, MessageEvent, Sse } from '@nestjs/common';
import { Observable } from 'rxjs';
import { SensorStreamService } from './sensor-stream.service';

@Controller('sse')
export class StreamController {
  constructor(private readonly sensorStreamService: SensorStreamService) {}

  @Sse()
  stream(): Observable<MessageEvent> {
    return this.sensorStreamService.frames();
  }
}
