import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDateString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { BidIncrementPolicy } from '@gemhouse/shared';

const PERCENT_PATTERN = /^\d{1,3}(\.\d{1,2})?$/;

export class SessionRulesDto {
  @IsEnum(BidIncrementPolicy)
  @IsOptional()
  bidIncrementPolicy?: BidIncrementPolicy;

  @IsBoolean()
  @IsOptional()
  requireRegistration?: boolean;

  @Matches(PERCENT_PATTERN)
  @IsOptional()
  buyerFeePercentage?: string;

  @Matches(PERCENT_PATTERN)
  @IsOptional()
  sellerFeePercentage?: string;

  @IsBoolean()
  @IsOptional()
  antiSnipingEnabled?: boolean;

  @IsInt()
  @Min(1)
  @Max(3600)
  @IsOptional()
  antiSnipingTriggerSeconds?: number;

  @IsInt()
  @Min(1)
  @Max(3600)
  @IsOptional()
  antiSnipingExtensionSeconds?: number;
}

export class CreateSessionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsString()
  @MaxLength(20)
  @IsOptional()
  code?: string;

  @IsDateString()
  startAt!: string;

  @IsDateString()
  endAt!: string;

  @IsUUID()
  @IsOptional()
  assignedStaffId?: string;

  @ValidateNested()
  @Type(() => SessionRulesDto)
  @IsOptional()
  rules?: SessionRulesDto;
}
