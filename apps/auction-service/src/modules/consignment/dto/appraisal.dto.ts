import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { MONEY_PATTERN } from '../../../common/utils/money';

export class NotesDto {
  @IsString()
  @MaxLength(2000)
  @IsOptional()
  notes?: string;
}

export class PreliminaryAppraisalDto extends NotesDto {
  @Matches(MONEY_PATTERN)
  estimatedPrice!: string;
}

export class FinalAppraisalDto extends PreliminaryAppraisalDto {
  @Matches(MONEY_PATTERN)
  @IsOptional()
  reservePrice?: string;
}

export class RejectSellRequestDto {
  @IsString()
  @MaxLength(2000)
  reason!: string;
}
