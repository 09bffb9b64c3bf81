import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';

export class StartSubscriptionDto {
  /**
   * Chat-platform user id
   *
   * @example "123456789"
   */
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  @Matches(/^[A-Za-z0-9_-]+$/)
  userId!: string;

  /**
   * Defaults to the `default` plan
   */
  @IsOptional()
  @IsString()
  @MaxLength(64)
  planId?: string;
}
