import { IsOptional, IsString, MaxLength, MinLength } from 'class-validator';

export class AnalyzeImageDto {
  /**
   * ISO alpha-2 code or country name used for the contact lookup.
   * Defaults to "IN" in the orchestrator.
   */
  @IsOptional()
  @IsString()
  @MinLength(2)
  @MaxLength(64)
  country_code?: string;
}
