import { IsInt, IsOptional, IsString, Length, Min, ValidateIf } from 'class-validator';

export class UpdatePlanPriceDto {
  /**
   * New price in minor units (cents)
   *
   * @example 1299
   */
  @IsInt()
  @Min(1)
  amountMinor!: number;

  /**
   * Price for returning users; null removes it
   */
  @IsOptional()
  @ValidateIf((_, value) => value !== null)
  @IsInt()
  @Min(1)
  returningAmountMinor?: number | null;

  @IsOptional()
  @IsString()
  @Length(3, 3)
  currency?: string;
}
