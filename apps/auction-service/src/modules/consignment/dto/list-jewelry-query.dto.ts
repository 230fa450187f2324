import { IsEnum, IsOptional, IsString, IsUUID, Matches, MaxLength } from 'class-validator';
import { JewelryStatus } from '@gemhouse/shared';
import { PageQueryDto } from '../../../common/dto/page-query.dto';
import { MONEY_PATTERN } from '../../../common/utils/money';

export class ListJewelryQueryDto extends PageQueryDto {
  @IsEnum(JewelryStatus)
  @IsOptional()
  status?: JewelryStatus;

  @IsUUID()
  @IsOptional()
  ownerId?: string;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  search?: string;

  @Matches(MONEY_PATTERN)
  @IsOptional()
  minPrice?: string;

  @Matches(MONEY_PATTERN)
  @IsOptional()
  maxPrice?: string;
}
