import { Controller, Get } from '@nestjs/common';

import { StoreService } from '../store/store.service';

@Controller('health')
export class HealthController {
  constructor(private readonly storeService: StoreService) {}

  @Get()
  getHealth(): { status: string } {
    return { status: 'ok' };
  }

  @Get('store')
  async getStoreHealth(): Promise<{ status: string; message?: string }> {
    const result = await this.storeService.checkHealth();
    return { status: result.status, message: result.message };
  }
}
