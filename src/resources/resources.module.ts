import { Module } from '@nestjs/common';
import { UpstreamModule } from '../upstream/upstream.module';
import { ResourcesController } from './resources.controller';
import { ResourcesService } from './resources.service';

@Module({
  imports: [UpstreamModule],
  providers: [ResourcesService],
  controllers: [ResourcesController],
})
export class ResourcesModule {}
