import { IsString } from 'class-validator';

export class StoreCredentialDto {
  @IsString()
  credentialId!: string;

  @IsString()
  issuerDID!: string;

  @IsString()
  subjectDID!: string;

  @IsString()
  data!: string;
}
