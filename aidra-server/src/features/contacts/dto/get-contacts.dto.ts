import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class GetContactsDto {
  /**
   * ISO alpha-2 code or a known country name, e.g. "IN" or "India".
   */
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  country_code!: string;

  /**
   * Free-text label; normalised the same way model output is.
   */
  @IsOptional()
  @IsString()
  @MaxLength(64)
  disaster_type?: string;
}
