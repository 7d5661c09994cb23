import { QueryParams } from '../upstream/upstream.client';
import { CreateResourceDto, ResourceListQueryDto } from './dto/resource.dto';

// Every resource created through the gateway lands in one upstream category.
export const RESOURCE_TYPE_ID = 25;
export const SERVICE_OFFERING_ID = 8;
export const DEFAULT_EXTERNAL_ID = '9';

export interface UpstreamResourcePayload {
  name: string;
  description: string;
  externalId: string;
  resourceType: { id: number };
  serviceOffering: { id: number };
}

export function toResourceQuery(query: ResourceListQueryDto): QueryParams {
  const params: QueryParams = {
    activeOnly: String(query.activeOnly ?? true),
  };
  if (query.resourceType) {
    params.resourceType = query.resourceType;
  }
  if (query.serviceOffering) {
    params.serviceOffering = query.serviceOffering;
  }
  return params;
}

export function toResourcePayload(dto: CreateResourceDto): UpstreamResourcePayload {
  return {
    name: dto.name,
    description: dto.description,
    externalId: dto.externalId ?? DEFAULT_EXTERNAL_ID,
    resourceType: { id: RESOURCE_TYPE_ID },
    serviceOffering: { id: SERVICE_OFFERING_ID },
  };
}
