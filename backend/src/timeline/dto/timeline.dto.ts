// pulse-director/backend/src/timeline/dto/timeline.dto.ts
import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { TimelineEventKind } from '../timeline.types';

export class TimelineEventDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  featureId!: string;

  @IsIn(['start', 'stop'])
  kind!: TimelineEventKind;

  @IsInt()
  @Min(0)
  minute!: number;

  @IsOptional()
  @IsString()
  pairedEventId?: string;
}

export class CreateTimelineDto {
  // Generated when omitted
  @IsOptional()
  @IsString()
  id?: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsInt()
  @Min(1)
  durationMinutes!: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TimelineEventDto)
  events!: TimelineEventDto[];

  @IsOptional()
  @IsObject()
  phrasePools?: Record<string, string[]>;
}
