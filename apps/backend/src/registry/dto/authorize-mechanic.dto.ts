import { Matches } from 'class-validator';

export class AuthorizeMechanicDto {
  @Matches(/^0x[a-fA-F0-9]{1,64}$/)
  mechanic!: string;
}
