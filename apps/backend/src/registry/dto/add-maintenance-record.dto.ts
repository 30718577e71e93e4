import { IsBoolean, IsString } from 'class-validator';

export class AddMaintenanceRecordDto {
  @IsString()
  description!: string;

  @IsBoolean()
  critical!: boolean;
}
