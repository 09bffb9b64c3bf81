import { Reflector } from '@nestjs/core';
import { PaymentProviderName } from '../../config/env.validation';
import { PaymentGateway } from '../../domain/subscriptions';
import { PROVIDER_METADATA_KEY } from './provider-metadata.decorator';
import { ProviderMetadataOptions } from './provider.types';

/**
 * Picks the gateway whose @ProviderMetadata name matches the configured
 * provider. Resolution happens once at startup; there is no runtime registry.
 */
export const resolvePaymentGateway = (
  reflector: Reflector,
  candidates: PaymentGateway[],
  configured: PaymentProviderName,
): { gateway: PaymentGateway; metadata: ProviderMetadataOptions } => {
  for (const gateway of candidates) {
    const metadata = reflector.get<ProviderMetadataOptions | undefined>(
      PROVIDER_METADATA_KEY,
      gateway.constructor,
    );
    if (metadata?.name === configured) {
      return { gateway, metadata };
    }
  }
  throw new Error(`No payment gateway registered for provider "${configured}"`);
};
