import { IsJSON } from 'class-validator';

export class UpdateVehicleConfigDto {
  @IsJSON()
  config!: string;
}
