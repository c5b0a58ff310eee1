import { IsBoolean } from 'class-validator';

export class SetOperatorDto {
  @IsBoolean() approved!: boolean;
}
