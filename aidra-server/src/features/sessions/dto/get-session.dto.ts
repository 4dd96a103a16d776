import { IsString, MaxLength } from 'class-validator';

export class GetSessionParamsDto {
  @IsString()
  @MaxLength(128)
  session_id!: string;
}
