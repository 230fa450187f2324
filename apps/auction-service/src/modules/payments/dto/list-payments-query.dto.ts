import { IsOptional, IsUUID } from 'class-validator';
import { PageQueryDto } from '../../../common/dto/page-query.dto';

export class ListPaymentsQueryDto extends PageQueryDto {
  /** Staff may look at another user's records. */
  @IsUUID()
  @IsOptional()
  userId?: string;
}
