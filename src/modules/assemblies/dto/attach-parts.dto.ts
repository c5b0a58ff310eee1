import { IsArray, IsInt } from 'class-validator';

export class AttachPartsDto {
  @IsArray() @IsInt({ each: true }) partIds!: number[];
}
