/**
 * Pagination Query DTO
 * Shared by every list endpoint: ?limit=20&offset=0
 */

import { Transform, TransformFnParams } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export const DEFAULT_PAGE_LIMIT = 20;

export interface Page {
  limit: number;
  offset: number;
}

/**
 * Only a plain run of digits becomes a number; '', ' ', '1.5' or a repeated parameter
 * become NaN so IsInt rejects them.
 */
export function toQueryInteger({ value }: TransformFnParams): number {
  if (typeof value === 'number') {
    return value;
  }
  return typeof value === 'string' && /^-?\d+$/.test(value) ? Number(value) : Number.NaN;
}

export class PaginationQueryDto {
  @IsOptional()
  @Transform(toQueryInteger)
  @IsInt()
  @Min(0)
  @Max(Number.MAX_SAFE_INTEGER)
  limit: number = DEFAULT_PAGE_LIMIT;

  @IsOptional()
  @Transform(toQueryInteger)
  @IsInt()
  @Min(0)
  @Max(Number.MAX_SAFE_INTEGER)
  offset: number = 0;
}
