import { IsIn, IsString, MinLength } from 'class-validator';

import { Role, ROLES } from '../registry.types';

export class CreateWalletDto {
  @IsString()
  @MinLength(1)
  name!: string;

  @IsIn(ROLES)
  role!: Role;
}
