import { IsEnum } from 'class-validator';
import { UserRole } from '@gemhouse/shared';

export class ChangeRoleDto {
  @IsEnum(UserRole)
  role!: UserRole;
}
