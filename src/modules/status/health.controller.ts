import { Controller, Get } from '@nestjs/common';
import { StatusService } from './status.service';

@Controller('health')
export class HealthController {
  constructor(private readonly statusService: StatusService) {}

  @Get()
  getHealth(): { status: 'healthy'; timestamp: string } {
    return this.statusService.getHealth();
  }
}
