import { Type } from 'class-transformer';
import { IsArray, IsNumber, IsOptional, IsString, ValidateNested } from 'class-validator';

// Subset of a quote candidate returned by the Yahoo Finance search endpoint
export class YahooSearchQuoteDto {
  @IsOptional()
  @IsString()
  symbol?: string;

  @IsOptional()
  @IsString()
  shortname?: string;

  @IsOptional()
  @IsString()
  longname?: string;

  @IsOptional()
  @IsString()
  quoteType?: string;

  @IsOptional()
  @IsString()
  exchange?: string;

  @IsOptional()
  @IsNumber()
  score?: number;
}

// news/lists are requested with count 0 and not modelled
export class YahooSearchResponseDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => YahooSearchQuoteDto)
  quotes?: YahooSearchQuoteDto[];
}
