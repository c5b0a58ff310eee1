import { IsString } from 'class-validator';

export class ApprovePartDto {
  @IsString() approved!: string;
}
