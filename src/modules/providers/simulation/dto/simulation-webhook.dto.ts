import {
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Min,
} from 'class-validator';

/**
 * Webhook body delivered by the simulation backend
 *
 * {
 *   "id": "sim_evt_...",
 *   "type": "charge.succeeded",
 *   "subscription_id": "<our subscription uuid>",
 *   "occurred_at": "2024-01-01T00:00:00.000Z"
 * }
 */
export class SimulationWebhookDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  type!: string;

  @IsOptional()
  @IsString()
  subscription_id?: string;

  @IsOptional()
  @IsString()
  provider_subscription_ref?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  amount_minor?: number;

  @IsOptional()
  @IsString()
  @Length(3, 3)
  currency?: string;

  @IsISO8601()
  occurred_at!: string;
}
