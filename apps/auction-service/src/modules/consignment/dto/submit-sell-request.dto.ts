import {
  ArrayMaxSize,
  IsArray,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { MAX_DESCRIPTION_LENGTH, MAX_PHOTOS, MAX_TITLE_LENGTH } from '../services/sell-request.service';

export class SubmitSellRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_TITLE_LENGTH)
  title!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_DESCRIPTION_LENGTH)
  description!: string;

  /** Opaque storage references; upload happens elsewhere. */
  @IsArray()
  @ArrayMaxSize(MAX_PHOTOS)
  @IsString({ each: true })
  photos!: string[];

  @IsObject()
  @IsOptional()
  attributes?: Record<string, string>;

  @Matches(/^\d{1,7}(\.\d{1,3})?$/, { message: 'weight must be grams with at most 3 decimals' })
  @IsOptional()
  weight?: string;

  @IsString()
  @MaxLength(20)
  @IsOptional()
  code?: string;

  @IsString()
  @MaxLength(2000)
  @IsOptional()
  sellerNotes?: string;
}
