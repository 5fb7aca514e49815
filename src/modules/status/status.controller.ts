import { Controller, Get } from '@nestjs/common';
import { CacheStats } from '../utils/cache.interface';
import { CacheService } from '../utils/cache.service';
import { ServiceStatus, StatusService } from './status.service';

@Controller('status')
export class StatusController {
  constructor(
    private readonly statusService: StatusService,
    private readonly cacheService: CacheService,
  ) {}

  @Get()
  getStatus(): Promise<ServiceStatus> {
    return this.statusService.getStatus();
  }

  @Get('cache')
  getCacheStats(): Promise<CacheStats> {
    return this.cacheService.getStats();
  }
}
