/**
 * Decorator for marking payment gateway implementations
 *
 * Usage:
 * @Injectable()
 * @ProviderMetadata({ name: 'stripe', displayName: 'Stripe' })
 * export class StripeGateway implements PaymentGateway { ... }
 */

import { SetMetadata } from '@nestjs/common';
import { ProviderMetadataOptions } from './provider.types';

export const PROVIDER_METADATA_KEY = 'provider:metadata';

export const ProviderMetadata = (options: ProviderMetadataOptions) => {
  return SetMetadata(PROVIDER_METADATA_KEY, options);
};
