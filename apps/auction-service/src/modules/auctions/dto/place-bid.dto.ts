import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { MONEY_PATTERN } from '../../../common/utils/money';

export class PlaceBidDto {
  @Matches(MONEY_PATTERN, { message: 'amount must be a decimal with at most 2 fraction digits' })
  amount!: string;

  @IsString()
  @MaxLength(255)
  @IsOptional()
  idempotencyKey?: string;
}
