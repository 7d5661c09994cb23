import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional, IsString, Matches } from 'class-validator';
import { coerceBoolean } from '../../shared/coercion';

/** At least one non-whitespace character. */
const NOT_BLANK = /\S/;

export class ResourceListQueryDto {
  @ApiPropertyOptional({
    type: String,
    default: 'true',
    description: 'true/false, 1/0, yes/no, on/off, t/f or y/n, any case',
  })
  @IsOptional()
  @Transform(({ value }) => coerceBoolean(value) ?? value)
  @IsBoolean({ message: 'activeOnly must be a boolean' })
  activeOnly?: boolean;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString({ message: 'resourceType must be a string' })
  resourceType?: string;

  @ApiPropertyOptional({ description: 'Service offering id' })
  @IsOptional()
  @IsString({ message: 'serviceOffering must be a string' })
  serviceOffering?: string;
}

export class CreateResourceDto {
  @ApiProperty()
  @IsString({ message: 'name is required' })
  @Matches(NOT_BLANK, { message: 'name is required' })
  name!: string;

  @ApiProperty()
  @IsString({ message: 'description is required' })
  @Matches(NOT_BLANK, { message: 'description is required' })
  description!: string;

  @ApiPropertyOptional({ default: '9' })
  @IsOptional()
  @IsString({ message: 'externalId must be a string' })
  externalId?: string;
}
