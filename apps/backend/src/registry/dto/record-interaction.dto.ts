import { IsOptional, IsString, Matches } from 'class-validator';

export class RecordInteractionDto {
  @Matches(/^0x[a-fA-F0-9]{1,64}$/)
  destination!: string;

  @IsString()
  sourceIdentifier!: string;

  @IsString()
  destinationIdentifier!: string;

  @IsString()
  interactionType!: string;

  @IsOptional()
  @IsString()
  payload?: string;
}
