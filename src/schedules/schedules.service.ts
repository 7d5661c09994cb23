import { Injectable } from '@nestjs/common';
import { UpstreamClient, UpstreamResponse } from '../upstream/upstream.client';
import { CreateScheduleDto, ScheduleListQueryDto } from './dto/schedule.dto';
import { parseScheduleId, toScheduleQuery, toSchedulePayload, toStatusPayload } from './schedules.mapper';

@Injectable()
export class SchedulesService {
  constructor(private readonly upstream: UpstreamClient) {}

  list(query: ScheduleListQueryDto): Promise<UpstreamResponse> {
    return this.upstream.get('/api/schedules', toScheduleQuery(query));
  }

  async create(dto: CreateScheduleDto): Promise<UpstreamResponse> {
    return this.upstream.post('/api/schedules', toSchedulePayload(dto));
  }

  async cancel(rawScheduleId: string): Promise<UpstreamResponse> {
    const id = parseScheduleId(rawScheduleId);
    return this.upstream.put(`/api/schedules/${id}/status`, toStatusPayload(id));
  }
}
