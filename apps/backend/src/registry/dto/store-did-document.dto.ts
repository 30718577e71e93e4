import { IsString } from 'class-validator';

export class StoreDidDocumentDto {
  @IsString()
  document!: string;
}
