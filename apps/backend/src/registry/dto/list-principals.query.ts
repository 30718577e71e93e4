import { IsIn, IsOptional } from 'class-validator';

import { Role, ROLES } from '../registry.types';

export class ListPrincipalsQuery {
  @IsOptional()
  @IsIn(ROLES)
  role?: Role;
}
