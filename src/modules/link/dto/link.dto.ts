import { PaginationDto } from '@/common/dto/pagination.dto';
import { trim } from '@/common/dto/transforms';
import { Transform, Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';

export class LinkPageDto extends PaginationDto {
  @IsOptional()
  @IsString({ message: i18nValidationMessage('validation.STRING') })
  @Transform(trim)
  key?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: i18nValidationMessage('validation.INT') })
  @Min(0, { message: i18nValidationMessage('validation.MIN') })
  category_id?: number;
}

export class LinkDto {
  /** 0 or absent leaves the link uncategorised. */
  @IsOptional()
  @IsInt({ message: i18nValidationMessage('validation.INT') })
  @Min(0, { message: i18nValidationMessage('validation.MIN') })
  category_id?: number;

  @MaxLength(100, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  name!: string;

  @MaxLength(255, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  url!: string;

  @IsOptional()
  @IsString({ message: i18nValidationMessage('validation.STRING') })
  @MaxLength(255, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @Transform(trim)
  desc?: string;

  @MaxLength(255, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  icon!: string;
}

export class LinkEditDto extends LinkDto {
  @IsInt({ message: i18nValidationMessage('validation.INT') })
  @Min(1, { message: i18nValidationMessage('validation.MIN') })
  ID!: number;
}
