import { coerceInteger } from '../shared/coercion';
import { ValidationError } from '../shared/gateway-errors';
import { QueryParams } from '../upstream/upstream.client';
import { CANCELLED_STATUS, CreateScheduleDto, ScheduleListQueryDto } from './dto/schedule.dto';

export const EVENT_ID_PREFIX = 'event_';

export interface UpstreamSchedulePayload {
  resources: Array<{ id: number }>;
  timeslot: { start: string; end: string };
}

export interface UpstreamStatusPayload {
  id: number;
  status: typeof CANCELLED_STATUS;
}

export function parseScheduleId(raw: string): number {
  const candidate = raw.startsWith(EVENT_ID_PREFIX) ? raw.slice(EVENT_ID_PREFIX.length) : raw;
  const id = coerceInteger(candidate);
  if (id === null) {
    throw new ValidationError(`Invalid schedule ID: ${raw}`);
  }
  return id;
}

export function toScheduleQuery(query: ScheduleListQueryDto): QueryParams {
  return { page: query.page, sort: query.sort };
}

export function toSchedulePayload(dto: CreateScheduleDto): UpstreamSchedulePayload {
  const first: unknown = dto.resources[0];
  const rawId = isRecord(first) ? first.id : undefined;
  if (rawId === undefined || rawId === null) {
    throw new ValidationError('resources[0].id is required');
  }
  const id = coerceInteger(rawId);
  if (id === null) {
    throw new ValidationError(`Invalid resource ID: ${typeof rawId === 'string' ? rawId : JSON.stringify(rawId)}`);
  }
  return {
    resources: [{ id }],
    timeslot: { start: dto.timeslot.start, end: dto.timeslot.end },
  };
}

export function toStatusPayload(id: number): UpstreamStatusPayload {
  return { id, status: CANCELLED_STATUS };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
