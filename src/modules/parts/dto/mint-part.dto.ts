import { IsInt, IsOptional, IsString } from 'class-validator';

export class MintPartDto {
  @IsOptional() @IsString() owner?: string;
  @IsInt() partNumber!: number;
  @IsString() name!: string;
  @IsString() manufacturer!: string;
}
