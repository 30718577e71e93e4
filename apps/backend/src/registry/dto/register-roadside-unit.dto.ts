import { IsString } from 'class-validator';

export class RegisterRoadsideUnitDto {
  @IsString()
  name!: string;

  @IsString()
  location!: string;

  @IsString()
  entityDID!: string;

  @IsString()
  walletDID!: string;
}
