import { IsArray, IsInt, IsString } from 'class-validator';

export class AssemblePartsDto {
  @IsInt() partNumber!: number;
  @IsString() name!: string;
  @IsString() manufacturer!: string;
  @IsArray() @IsInt({ each: true }) partIds!: number[];
}
