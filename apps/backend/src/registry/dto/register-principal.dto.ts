import { IsIn, IsString } from 'class-validator';

import { Role, ROLES } from '../registry.types';

export class RegisterPrincipalDto {
  @IsString()
  name!: string;

  @IsIn(ROLES)
  role!: Role;

  @IsString()
  entityDID!: string;

  @IsString()
  walletDID!: string;
}
