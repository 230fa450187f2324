import { IsEnum, IsObject, IsOptional } from 'class-validator';
import { PaymentMethod } from '@gemhouse/shared';

export class ProcessPaymentDto {
  @IsEnum(PaymentMethod)
  method!: PaymentMethod;

  /** Passed through to the gateway untouched. */
  @IsObject()
  @IsOptional()
  details?: Record<string, unknown>;
}
