import { PaginationDto } from '@/common/dto/pagination.dto';
import { trim } from '@/common/dto/transforms';
import { Transform, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';
import { CategoryType } from '../entities/category.entity';

const CATEGORY_TYPES = [CategoryType.ARTICLE, CategoryType.LINK];

export class CategoryPageDto extends PaginationDto {
  @Type(() => Number)
  @IsIn(CATEGORY_TYPES, {
    message: i18nValidationMessage('validation.CATEGORY_TYPE'),
  })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  category_type!: CategoryType;

  @IsOptional()
  @IsString({ message: i18nValidationMessage('validation.STRING') })
  @Transform(trim)
  key?: string;
}

export class CategoryAllQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsIn(CATEGORY_TYPES, {
    message: i18nValidationMessage('validation.CATEGORY_TYPE'),
  })
  type: CategoryType = CategoryType.ARTICLE;
}

/**
 * DTO for adding an article category
 */
export class ArticleCategoryDto {
  @MaxLength(100, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  name!: string;

  @MaxLength(255, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  url!: string;

  /** 0 or absent means top level. */
  @IsOptional()
  @IsInt({ message: i18nValidationMessage('validation.INT') })
  @Min(0, { message: i18nValidationMessage('validation.MIN') })
  parent_id?: number;
}

/**
 * DTO for editing an article category
 */
export class ArticleCategoryEditDto extends ArticleCategoryDto {
  @IsInt({ message: i18nValidationMessage('validation.INT') })
  @Min(1, { message: i18nValidationMessage('validation.MIN') })
  ID!: number;
}

/**
 * DTO for adding a friend-link category
 */
export class LinkCategoryDto {
  @MaxLength(100, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  name!: string;
}

/**
 * DTO for editing a friend-link category
 */
export class LinkCategoryEditDto extends LinkCategoryDto {
  @IsInt({ message: i18nValidationMessage('validation.INT') })
  @Min(1, { message: i18nValidationMessage('validation.MIN') })
  ID!: number;
}
