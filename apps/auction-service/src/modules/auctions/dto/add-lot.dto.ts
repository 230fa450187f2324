import { IsOptional, IsUUID, Matches } from 'class-validator';
import { MONEY_PATTERN } from '../../../common/utils/money';

export class AddLotDto {
  @IsUUID()
  sellRequestId!: string;

  @Matches(MONEY_PATTERN)
  startPrice!: string;

  @Matches(MONEY_PATTERN)
  stepPrice!: string;

  /** Defaults to the reserve from the final appraisal. */
  @Matches(MONEY_PATTERN)
  @IsOptional()
  reservePrice?: string;
}
