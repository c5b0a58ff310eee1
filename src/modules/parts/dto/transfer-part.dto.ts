import { IsOptional, IsString } from 'class-validator';

export class TransferPartDto {
  @IsString() to!: string;
  @IsOptional() @IsString() from?: string;
}
