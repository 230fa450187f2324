import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { MONEY_PATTERN } from '../../../common/utils/money';

export class RequestRefundDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  reason!: string;

  /** Defaults to the full payment amount. */
  @Matches(MONEY_PATTERN)
  @IsOptional()
  amount?: string;
}
