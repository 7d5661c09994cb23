import { Injectable } from '@nestjs/common';
import { UpstreamClient, UpstreamResponse } from '../upstream/upstream.client';
import { CreateResourceDto, ResourceListQueryDto } from './dto/resource.dto';
import { toResourcePayload, toResourceQuery } from './resources.mapper';

@Injectable()
export class ResourcesService {
  constructor(private readonly upstream: UpstreamClient) {}

  list(query: ResourceListQueryDto): Promise<UpstreamResponse> {
    return this.upstream.get('/api/resources', toResourceQuery(query));
  }

  create(dto: CreateResourceDto): Promise<UpstreamResponse> {
    return this.upstream.post('/api/resources', toResourcePayload(dto));
  }
}
