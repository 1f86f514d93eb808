import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class StartEngineDto {
  // Default mode when omitted
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  timelineId?: string;
}
