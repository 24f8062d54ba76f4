import { Module } from '@nestjs/common';

import { HttpClientModule } from '../http-client/http-client.module';
import { UpstreamClientService } from './upstream-client.service';

@Module({
  imports: [HttpClientModule],
  providers: [UpstreamClientService],
  exports: [UpstreamClientService],
})
export class UpstreamModule {}
