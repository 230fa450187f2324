import { IsEnum, IsOptional, IsUUID } from 'class-validator';
import { SellRequestStatus } from '@gemhouse/shared';
import { PageQueryDto } from '../../../common/dto/page-query.dto';

export class ListSellRequestsQueryDto extends PageQueryDto {
  @IsEnum(SellRequestStatus)
  @IsOptional()
  status?: SellRequestStatus;

  /** Honoured for staff only; members always see their own. */
  @IsUUID()
  @IsOptional()
  sellerId?: string;
}
