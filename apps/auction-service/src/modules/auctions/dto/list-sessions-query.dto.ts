import { IsEnum, IsOptional, IsString, MaxLength } from 'class-validator';
import { EnrollmentStatus, SessionStatus } from '@gemhouse/shared';
import { PageQueryDto } from '../../../common/dto/page-query.dto';

export class ListSessionsQueryDto extends PageQueryDto {
  @IsEnum(SessionStatus)
  @IsOptional()
  status?: SessionStatus;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  search?: string;
}

export class ListEnrollmentsQueryDto extends PageQueryDto {
  @IsEnum(EnrollmentStatus)
  @IsOptional()
  status?: EnrollmentStatus;
}
