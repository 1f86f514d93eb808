import { IsBoolean, IsOptional } from 'class-validator';

export class StopSessionDto {
  // Abandoned (no XP) unless the caller marks the run as completed
  @IsOptional()
  @IsBoolean()
  completed?: boolean = false;
}
