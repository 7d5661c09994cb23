import { Module } from '@nestjs/common';
import { UpstreamModule } from '../upstream/upstream.module';
import { SchedulesController } from './schedules.controller';
import { SchedulesService } from './schedules.service';

@Module({
  imports: [UpstreamModule],
  providers: [SchedulesService],
  controllers: [SchedulesController],
})
export class SchedulesModule {}
