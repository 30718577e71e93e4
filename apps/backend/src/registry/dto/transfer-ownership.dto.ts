import { Matches } from 'class-validator';

export class TransferOwnershipDto {
  @Matches(/^0x[a-fA-F0-9]{1,64}$/)
  newOwner!: string;
}
