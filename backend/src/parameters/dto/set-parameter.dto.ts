import { IsNumber } from 'class-validator';

export class SetParameterDto {
  @IsNumber()
  value!: number;
}
