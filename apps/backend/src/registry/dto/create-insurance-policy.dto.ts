import { IsInt, Min } from 'class-validator';

export class CreateInsurancePolicyDto {
  @IsInt()
  @Min(0)
  startDate!: number;

  @IsInt()
  @Min(0)
  endDate!: number;
}
