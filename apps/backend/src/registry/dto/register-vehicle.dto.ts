import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';

export class RegisterVehicleDto {
  @IsString()
  vin!: string;

  @IsString()
  ownerDID!: string;

  @IsString()
  entityDID!: string;

  @IsString()
  walletDID!: string;

  @IsOptional()
  @IsString()
  credentialDID?: string;

  @IsString()
  make!: string;

  @IsString()
  model!: string;

  @IsInt()
  @Min(1950)
  @Max(2100)
  year!: number;
}
