import { Injectable } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { MalformedPayloadError } from '../errors/subscription.errors';
import { logger } from '../logger/logger.config';

const flattenConstraints = (errors: ValidationError[]): string[] =>
  errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenConstraints(error.children ?? []),
  ]);

@Injectable()
export class PayloadValidatorService {
  private readonly logger = logger();

  /**
   * Decodes a raw webhook body into a plain JSON object
   */
  parseJsonObject(rawBody: Buffer | string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody.toString());
    } catch (error) {
      throw new MalformedPayloadError('Payload is not valid JSON');
    }

    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new MalformedPayloadError('Payload must be a JSON object');
    }

    return { ...parsed };
  }

  validateWithDto<T extends object>(
    payload: Record<string, unknown>,
    dtoClass: ClassConstructor<T>,
  ): T {
    const dto = plainToInstance(dtoClass, payload);
    const errors = validateSync(dto, { whitelist: false });

    if (errors.length > 0) {
      const errorMessages = flattenConstraints(errors);
      this.logger.warn(
        { errors: errorMessages, dto: dtoClass.name },
        'Payload validation failed',
      );
      throw new MalformedPayloadError('Payload validation failed', errorMessages);
    }

    return dto;
  }

  parseAndValidate<T extends object>(
    rawBody: Buffer | string,
    dtoClass: ClassConstructor<T>,
  ): T {
    return this.validateWithDto(this.parseJsonObject(rawBody), dtoClass);
  }
}
