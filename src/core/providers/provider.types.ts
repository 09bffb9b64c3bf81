import { PaymentProviderName } from '../../config/env.validation';

export interface ProviderMetadataOptions {
  name: PaymentProviderName;
  displayName?: string;
  description?: string;
}
