import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional, IsString } from 'class-validator';

// Blank or whitespace-only values count as "not supplied"
function trimToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

// Options of the `search` command as parsed by commander
export class SearchOptionsDto {
  @Transform(({ value }) => trimToUndefined(value))
  @IsOptional()
  @IsString()
  ticker?: string;

  @Transform(({ value }) => trimToUndefined(value))
  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsBoolean()
  json?: boolean;
}
