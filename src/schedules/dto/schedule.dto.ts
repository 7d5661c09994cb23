import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDefined,
  IsIn,
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { coerceInteger } from '../../shared/coercion';

export const CANCELLED_STATUS = 'CANCELLED';

export class ScheduleListQueryDto {
  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @Transform(({ value }) => coerceInteger(value) ?? value)
  @IsInt({ message: 'page must be an integer' })
  page: number = 1;

  @ApiPropertyOptional({ default: 'id,asc' })
  @IsOptional()
  @IsString({ message: 'sort must be a string' })
  sort: string = 'id,asc';
}

export class ScheduleResourceRefDto {
  @ApiProperty({ oneOf: [{ type: 'integer' }, { type: 'string' }], example: 42 })
  id!: number | string;
}

export class TimeslotDto {
  @ApiProperty({ example: '2025-03-01T09:00:00Z' })
  @IsDefined({ message: 'timeslot.start is required' })
  @IsString({ message: 'timeslot.start must be a string' })
  start!: string;

  @ApiProperty({ example: '2025-03-01T10:00:00Z' })
  @IsDefined({ message: 'timeslot.end is required' })
  @IsString({ message: 'timeslot.end must be a string' })
  end!: string;
}

/**
 * Resource entries stay loosely typed here; the id coercion and the field
 * stripping happen in the schedules mapper.
 */
export class CreateScheduleDto {
  @ApiProperty({ type: [ScheduleResourceRefDto] })
  @IsArray({ message: 'resources must contain at least one entry' })
  @ArrayNotEmpty({ message: 'resources must contain at least one entry' })
  resources!: unknown[];

  @ApiProperty({ type: TimeslotDto })
  @IsObject({ message: 'timeslot is required' })
  @ValidateNested()
  @Type(() => TimeslotDto)
  timeslot!: TimeslotDto;
}

export class UpdateScheduleStatusDto {
  @ApiProperty({ enum: [CANCELLED_STATUS] })
  @IsDefined({ message: 'status is required' })
  @IsIn([CANCELLED_STATUS], { message: `status must be ${CANCELLED_STATUS}` })
  status!: typeof CANCELLED_STATUS;
}
