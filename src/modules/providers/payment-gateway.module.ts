import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { PaymentProviderName } from '../../config/env.validation';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { ProcessingLimitsService } from '../../core/limits/processing-limits.service';
import { logger } from '../../core/logger/logger.config';
import { resolvePaymentGateway } from '../../core/providers/provider-resolver';
import { PaymentGateway } from '../../domain/subscriptions';
import { PAYMENT_GATEWAY } from './payment-gateway.tokens';
import { ResilientPaymentGateway } from './resilient-payment-gateway';
import { SimulationGateway } from './simulation/simulation-gateway.service';
import { StripeGateway } from './stripe/stripe-gateway.service';

@Module({
  providers: [
    SimulationGateway,
    StripeGateway,
    {
      provide: PAYMENT_GATEWAY,
      inject: [
        ConfigService,
        Reflector,
        CircuitBreakerService,
        ProcessingLimitsService,
        SimulationGateway,
        StripeGateway,
      ],
      useFactory: (
        config: ConfigService,
        reflector: Reflector,
        circuitBreakers: CircuitBreakerService,
        limits: ProcessingLimitsService,
        simulation: SimulationGateway,
        stripe: StripeGateway,
      ): PaymentGateway => {
        const configured = config.get<PaymentProviderName>(
          'PAYMENT_PROVIDER',
          'simulation',
        );
        const { gateway, metadata } = resolvePaymentGateway(
          reflector,
          [simulation, stripe],
          configured,
        );
        if (gateway === stripe) {
          stripe.assertConfigured();
        }

        logger().info(
          { provider: metadata.name, displayName: metadata.displayName },
          'Payment gateway selected',
        );
        return new ResilientPaymentGateway(
          gateway,
          circuitBreakers,
          limits.getProviderCallTimeout(),
        );
      },
    },
  ],
  exports: [PAYMENT_GATEWAY, SimulationGateway],
})
export class PaymentGatewayModule {}
